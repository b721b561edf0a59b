/**
 * Timestamp formatting for message prefixes.
 *
 * Both helpers use local time, the way a person reading the terminal
 * expects it.
 *
 * @module formatting
 */

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Formats the time of day of a date.
 *
 * @param date - The moment to format
 * @returns The time as `HH:MM:SS`
 *
 * @example
 * ```typescript
 * formatClock(new Date(2025, 0, 5, 9, 4, 7))
 * // Returns: "09:04:07"
 * ```
 */
export function formatClock(date: Date): string {
  const hours = pad2(date.getHours());
  const minutes = pad2(date.getMinutes());
  return `${hours}:${minutes}:${pad2(date.getSeconds())}`;
}

/**
 * Formats a full local date and time.
 *
 * @param date - The moment to format
 * @returns The date and time as `YYYY-MM-DD HH:MM:SS`
 *
 * @example
 * ```typescript
 * formatDateTime(new Date(2025, 0, 5, 9, 4, 7))
 * // Returns: "2025-01-05 09:04:07"
 * ```
 */
export function formatDateTime(date: Date): string {
  const month = pad2(date.getMonth() + 1);
  const day = `${date.getFullYear()}-${month}-${pad2(date.getDate())}`;
  return `${day} ${formatClock(date)}`;
}
