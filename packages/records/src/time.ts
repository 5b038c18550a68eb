// All record timestamps are UTC with second precision: `YYYY-MM-DDTHH:MM:SSZ`.
// Engine code works in unix seconds and converts at the storage boundary.

export const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;

export const SECONDS_PER_HOUR = 3_600;
export const SECONDS_PER_DAY = 86_400;

export function formatTimestamp(unixSeconds: number): string {
  const ms = Math.floor(unixSeconds) * 1000;
  return `${new Date(ms).toISOString().slice(0, 19)}Z`;
}

export function parseTimestamp(timestamp: string): number {
  if (!TIMESTAMP_PATTERN.test(timestamp)) {
    throw new Error(`Invalid timestamp: ${timestamp}`);
  }
  const ms = Date.parse(timestamp);
  if (!Number.isFinite(ms)) {
    throw new Error(`Invalid timestamp: ${timestamp}`);
  }
  return Math.floor(ms / 1000);
}

export function utcDayStart(unixSeconds: number): number {
  return Math.floor(unixSeconds / SECONDS_PER_DAY) * SECONDS_PER_DAY;
}

export function utcHourStart(unixSeconds: number): number {
  return Math.floor(unixSeconds / SECONDS_PER_HOUR) * SECONDS_PER_HOUR;
}

/** `YYYY-MM-DD` of the UTC day containing `unixSeconds`. */
export function utcDateKey(unixSeconds: number): string {
  return formatTimestamp(unixSeconds).slice(0, 10);
}

export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}
