// Local-time date helpers

const pad = (n: number, width = 2): string => String(n).padStart(width, "0");

/**
 * YYYY-MM-DD in local time.
 */
export function toIsoDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * YYYYMMDD_HHMMSS in local time, used in session ids and file names.
 */
export function formatCompactTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Shift a local date by whole days.
 */
export function addDays(date: Date, days: number): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days);
}
