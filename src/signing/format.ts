/**
 * Date formatting utilities for Signature V4
 */

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format date as YYYYMMDD
 */
export function formatDateStamp(date: Date): string {
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
}

/**
 * Format date as YYYYMMDDTHHmmssZ (ISO 8601 basic format)
 */
export function formatAmzDate(date: Date): string {
  return (
    `${formatDateStamp(date)}T` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}Z`
  );
}
