/**
 * Text formatting for generated fields
 */

import type { Uptime } from './types.js';

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const;
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

function plural(value: number, noun: string): string {
  return `${value} ${noun}${value === 1 ? '' : 's'}`;
}

/**
 * Renders uptime the way IOS does.
 *
 * Weeks and days are omitted when zero; hours and minutes are always shown.
 *
 * @example
 * ```typescript
 * formatUptime({ weeks: 2, days: 0, hours: 1, minutes: 5 });
 * // "2 weeks, 1 hour, 5 minutes"
 * ```
 */
export function formatUptime(uptime: Uptime): string {
  const parts: string[] = [];

  if (uptime.weeks > 0) {
    parts.push(plural(uptime.weeks, 'week'));
  }
  if (uptime.days > 0) {
    parts.push(plural(uptime.days, 'day'));
  }
  parts.push(plural(uptime.hours, 'hour'));
  parts.push(plural(uptime.minutes, 'minute'));

  return parts.join(', ');
}

/**
 * Build timestamp in the banner's "Compiled" line, local time.
 *
 * @example
 * ```typescript
 * formatCompileDate(new Date(2024, 2, 5, 14, 7)); // "Tue 05-Mar-24 14:07"
 * ```
 */
export function formatCompileDate(date: Date): string {
  const weekday = WEEKDAYS[date.getDay()] ?? '';
  const month = MONTHS[date.getMonth()] ?? '';
  const year = pad2(date.getFullYear() % 100);

  return `${weekday} ${pad2(date.getDate())}-${month}-${year} ${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

/**
 * Compact local timestamp used in file names, e.g. "20240305_140709".
 */
export function formatFileTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
  return `${day}_${time}`;
}
