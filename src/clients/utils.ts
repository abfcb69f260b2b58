/**
 * Shared client utilities.
 */

import type { RequestParams } from '../shared/types.js';

/**
 * Parse a Go-style duration string (e.g., "6m23.456s", "1.5s", "2m0s") into milliseconds.
 * Several APIs use this format for their reset headers.
 *
 * Supported formats:
 *   "6m23.456s"  -> 383456 ms
 *   "1.5s"       -> 1500 ms
 *   "2m0s"       -> 120000 ms
 *   "0s"         -> 0 ms
 *   "500ms"      -> 500 ms
 *   "2h30m0s"    -> 9000000 ms
 */
export function parseDurationToMs(str: string): number {
  let totalMs = 0;

  const hoursMatch = str.match(/(\d+(?:\.\d+)?)h/);
  if (hoursMatch?.[1] !== undefined) {
    totalMs += parseFloat(hoursMatch[1]) * 3600000;
  }

  const minutesMatch = str.match(/(\d+(?:\.\d+)?)m(?!s)/);
  if (minutesMatch?.[1] !== undefined) {
    totalMs += parseFloat(minutesMatch[1]) * 60000;
  }

  const secondsMatch = str.match(/(\d+(?:\.\d+)?)s/);
  if (secondsMatch?.[1] !== undefined) {
    totalMs += parseFloat(secondsMatch[1]) * 1000;
  }

  const msMatch = str.match(/(\d+(?:\.\d+)?)ms/);
  if (msMatch?.[1] !== undefined) {
    totalMs += parseFloat(msMatch[1]);
  }

  return Math.round(totalMs);
}

/**
 * Parse a reset header value into milliseconds from `now`.
 * Accepts plain seconds ("30"), epoch seconds ("1700000000") and duration
 * strings ("1m30s"). Values that look like epoch seconds are converted
 * relative to `now`.
 */
export function parseResetToMs(value: string, now: number = Date.now()): number | undefined {
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    const seconds = parseFloat(trimmed);
    // Anything past 2001-09-09 in epoch seconds is a timestamp, not a delay
    if (seconds >= 1e9) {
      return Math.max(0, Math.round(seconds * 1000 - now));
    }
    return Math.round(seconds * 1000);
  }
  if (/^(\d+(\.\d+)?(h|ms|m|s))+$/.test(trimmed)) {
    return parseDurationToMs(trimmed);
  }
  return undefined;
}

/**
 * Build a query string from params.
 * Array values repeat the key; undefined values are skipped; null becomes "".
 */
export function buildQueryString(params: RequestParams | undefined): string {
  if (!params) return '';

  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) search.append(key, String(item));
    } else {
      search.append(key, value === null ? '' : String(value));
    }
  }

  const query = search.toString();
  return query ? `?${query}` : '';
}
