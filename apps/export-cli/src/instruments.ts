import { z } from 'zod';
import { UsageError } from './args';

const instrumentEntrySchema = z.union([
  z.string(),
  z.object({ symbol: z.string() }).passthrough(),
]);

const instrumentFileSchema = z.array(instrumentEntrySchema);

/**
 * Parse an instrument list file.
 *
 * Accepts a JSON array of codes (or of objects with a `symbol` field), or
 * plain text with one code per line where `#` starts a comment.
 */
export function parseInstrumentList(text: string, source = 'instrument list'): string[] {
  const trimmed = text.trim();
  if (trimmed.startsWith('[')) {
    let decoded: unknown;
    try {
      decoded = JSON.parse(trimmed);
    } catch {
      throw new UsageError(`${source} is not valid JSON`);
    }
    const result = instrumentFileSchema.safeParse(decoded);
    if (!result.success) {
      throw new UsageError(`${source} must be an array of codes or { "symbol": ... } objects`);
    }
    return result.data.map((entry) => (typeof entry === 'string' ? entry : entry.symbol).trim()).filter(Boolean);
  }

  return trimmed
    .split(/\r?\n/)
    .map((line) => line.replace(/#.*$/, '').trim())
    .filter(Boolean);
}

/** Concatenate lists, keeping the first occurrence of each code. */
export function mergeInstruments(...lists: string[][]): string[] {
  return [...new Set(lists.flat())];
}
