// NEM market time is AEST all year round: UTC+10, no daylight saving.
export const MARKET_UTC_OFFSET_MINUTES = 600;

const MARKET_OFFSET_MS = MARKET_UTC_OFFSET_MINUTES * 60_000;
const MARKET_OFFSET_SUFFIX = "+10:00";

const REPORT_DATETIME_PATTERN = /^(\d{4})\/(\d{2})\/(\d{2}) (\d{2}):(\d{2})(?::(\d{2}))?$/;
const FILE_TIMESTAMP_PATTERN = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})?$/;

function toEpochMs(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
): number | null {
  if (month < 1 || month > 12 || day < 1 || day > 31 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  const wallClockMs = Date.UTC(year, month - 1, day, hour, minute, second);
  const check = new Date(wallClockMs);
  // Date.UTC rolls 2025/02/30 over into March; reject instead.
  if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }
  return wallClockMs - MARKET_OFFSET_MS;
}

/**
 * Parses a report timestamp such as `2025/01/01 12:05:00` (market time) into
 * epoch milliseconds. Surrounding quotes and whitespace are tolerated.
 */
export function parseMarketTimestamp(value: string): number | null {
  const match = REPORT_DATETIME_PATTERN.exec(value.trim().replace(/^"|"$/g, ""));
  if (!match) {
    return null;
  }
  const [, year, month, day, hour, minute, second] = match;
  return toEpochMs(Number(year), Number(month), Number(day), Number(hour), Number(minute), Number(second ?? "0"));
}

/** Parses the `yyyymmddhhmm[ss]` token embedded in NEMWEB file names. */
export function parseFileTimestamp(token: string): number | null {
  const match = FILE_TIMESTAMP_PATTERN.exec(token.trim());
  if (!match) {
    return null;
  }
  const [, year, month, day, hour, minute, second] = match;
  return toEpochMs(Number(year), Number(month), Number(day), Number(hour), Number(minute), Number(second ?? "0"));
}

/** Renders epoch milliseconds as ISO 8601 in market time, e.g. `2025-01-01T12:05:00+10:00`. */
export function formatMarketIso(epochMs: number): string {
  const shifted = new Date(epochMs + MARKET_OFFSET_MS);
  return `${shifted.toISOString().slice(0, 19)}${MARKET_OFFSET_SUFFIX}`;
}
