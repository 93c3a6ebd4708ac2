import type { HttpTransport } from './types';
import { ServiceUnavailableError } from './types';

export const DEFAULT_TIMEOUT_MS = 30_000;

export const defaultTransport: HttpTransport = (url, init) => fetch(url, init);

/**
 * Run one HTTP exchange, aborting after `timeoutMs` (0 disables the timeout).
 * Transport failures and timeouts surface as ServiceUnavailableError.
 */
export async function executeHttp(
  transport: HttpTransport,
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<Response> {
  if (timeoutMs <= 0) {
    try {
      return await transport(url, init);
    } catch (error) {
      throw new ServiceUnavailableError(`Request to ${url} failed: ${describeError(error)}`);
    }
  }

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await transport(url, { ...init, signal: controller.signal });
  } catch (error) {
    const reason = controller.signal.aborted
      ? `timed out after ${timeoutMs}ms`
      : describeError(error);
    throw new ServiceUnavailableError(`Request to ${url} failed: ${reason}`);
  } finally {
    clearTimeout(timeoutId);
  }
}

export async function safeReadBody(response: Response): Promise<string | undefined> {
  try {
    return await response.text();
  } catch {
    return undefined;
  }
}

/** Statuses the caller may recover from by retrying later. */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export function isUnauthorizedStatus(status: number): boolean {
  return status === 401 || status === 403;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'network error';
}
