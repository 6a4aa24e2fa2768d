/**
 * Utility functions for formatting timestamps and other serialized values
 */

import type { Timestamp } from '../types';

/**
 * Wrap a Date as a UTC timestamp
 */
export function toTimestamp(instant: Date, offsetMinutes: number = 0): Timestamp {
  return { instant, offsetMinutes };
}

/**
 * Format a UTC offset the way RFC 3339 does
 * @param offsetMinutes - Minutes east of UTC
 * @returns "Z" for UTC, otherwise e.g. "-05:00" or "+13:00"
 */
export function formatOffset(offsetMinutes: number): string {
  if (offsetMinutes === 0) return 'Z';

  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  const hours = String(Math.floor(abs / 60)).padStart(2, '0');
  const minutes = String(abs % 60).padStart(2, '0');
  return `${sign}${hours}:${minutes}`;
}

/**
 * Format a timestamp as RFC 3339 in its own offset, e.g.
 * "2020-07-09T04:05:06-05:00". Fractional seconds appear only when non-zero.
 */
export function formatTimestamp(timestamp: Timestamp): string {
  const local = new Date(timestamp.instant.getTime() + timestamp.offsetMinutes * 60_000);
  const iso = local.toISOString(); // YYYY-MM-DDTHH:mm:ss.sssZ

  const millis = iso.slice(20, 23).replace(/0+$/, '');
  const fraction = millis ? `.${millis}` : '';

  return `${iso.slice(0, 19)}${fraction}${formatOffset(timestamp.offsetMinutes)}`;
}
