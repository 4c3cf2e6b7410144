/**
 * Date formatting for Aladhan path segments
 */

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local calendar date as DD-MM-YYYY
 */
export function formatDdMmYyyy(date: Date): string {
  return `${pad2(date.getDate())}-${pad2(date.getMonth() + 1)}-${date.getFullYear()}`;
}

/**
 * The caller's date, or today's local date when none was given
 */
export function resolveDate(date: string | undefined, now: Date = new Date()): string {
  return date || formatDdMmYyyy(now);
}
