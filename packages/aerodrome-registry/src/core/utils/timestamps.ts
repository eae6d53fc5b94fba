/**
 * Timestamp formatting for registry metadata and backup names.
 * Both use the host's local time, like the published `last_updated` field.
 */

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * ISO-8601 local time with numeric offset, second precision
 *
 * @example formatIsoWithOffset(new Date()) // "2026-10-19T14:03:00+02:00"
 */
export function formatIsoWithOffset(date: Date): string {
  const offsetMinutes = -date.getTimezoneOffset();
  const sign = offsetMinutes >= 0 ? '+' : '-';
  const absolute = Math.abs(offsetMinutes);

  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}` +
    `${sign}${pad(Math.floor(absolute / 60))}:${pad(absolute % 60)}`
  );
}

/**
 * Compact local stamp used in backup file names: YYYYMMDD_HHMMSS
 */
export function formatBackupStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
