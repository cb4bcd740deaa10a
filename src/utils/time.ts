/**
 * UTC date helpers shared by the market data commands
 */

import { MILLISECONDS_PER_DAY, SETTLEMENT_HOUR_UTC } from '../types';

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2}))?Z?$/;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Parse `YYYY-MM-DD` or `YYYY-MM-DD HH:MM[:SS]` as a UTC instant.
 *
 * @returns Milliseconds since epoch, or null when the text is not a real date
 */
export function parseUtcTimestamp(text: string): number | null {
  const trimmed = text.trim();
  const dateMatch = trimmed.match(DATE_PATTERN);
  const match = dateMatch ?? trimmed.match(DATE_TIME_PATTERN);
  if (!match) return null;

  const [year, month, day] = [match[1], match[2], match[3]].map((part) => parseInt(part, 10));
  const hour = match[4] ? parseInt(match[4], 10) : 0;
  const minute = match[5] ? parseInt(match[5], 10) : 0;
  const second = match[6] ? parseInt(match[6], 10) : 0;

  if (hour > 23 || minute > 59 || second > 59) return null;

  const timestamp = Date.UTC(year, month - 1, day, hour, minute, second);
  const check = new Date(timestamp);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }

  return timestamp;
}

/**
 * Settlement instant (08:00 UTC) of a `YYYY-MM-DD` date, or null
 */
export function settlementInstantOf(date: string): number | null {
  if (!DATE_PATTERN.test(date.trim())) return null;
  const midnight = parseUtcTimestamp(date);
  return midnight === null ? null : midnight + (SETTLEMENT_HOUR_UTC * MILLISECONDS_PER_DAY) / 24;
}

/**
 * `YYYY-MM-DD` in UTC
 */
export function formatUtcDate(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

/**
 * `YYYY-MM-DD HH:MM:SS` in UTC
 */
export function formatUtcDateTime(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 19).replace('T', ' ');
}
