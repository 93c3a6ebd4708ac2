const DSWS_DATE_PATTERN = /^\/Date\((-?\d+)(?:[+-]\d{4})?\)\/$/;

/**
 * Parse a DSWS `/Date(1577836800000+0000)/` literal into epoch milliseconds.
 *
 * The millisecond count is already UTC; the trailing offset only describes the
 * server's zone and is ignored.
 */
export function parseDswsDate(raw: string | null | undefined): number | null {
  if (!raw) {
    return null;
  }
  const match = DSWS_DATE_PATTERN.exec(raw.trim());
  if (!match?.[1]) {
    return null;
  }
  const ms = Number(match[1]);
  return Number.isFinite(ms) ? ms : null;
}

/** `YYYY-MM-DD` in UTC. */
export function toIsoDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

export function parseDswsDateToIso(raw: string | null | undefined): string | null {
  const ms = parseDswsDate(raw);
  return ms === null ? null : toIsoDate(ms);
}
