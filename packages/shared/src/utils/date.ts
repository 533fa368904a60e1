/**
 * Date utilities for window and token-expiry arithmetic.
 * Every helper takes an explicit `now` so callers and tests share one clock.
 */

/**
 * Check whether at least `durationMs` has passed since `since`.
 * Used for the lazy reset of rolling usage windows.
 */
export function hasElapsed(since: Date, durationMs: number, now: Date = new Date()): boolean {
  return now.getTime() - since.getTime() >= durationMs;
}

export function subtractMs(date: Date, ms: number): Date {
  return new Date(date.getTime() - ms);
}

export function addMs(date: Date, ms: number): Date {
  return new Date(date.getTime() + ms);
}

export function subtractDays(date: Date, days: number): Date {
  return subtractMs(date, days * 24 * 60 * 60 * 1000);
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a date as `YYYYMMDD_HHMMSS` in UTC, for file names.
 */
export function formatCompactTimestamp(date: Date): string {
  const day = `${String(date.getUTCFullYear())}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `${day}_${time}`;
}
