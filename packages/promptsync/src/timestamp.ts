/**
 * Local-time timestamp formatting for snapshot names, log lines and stash
 * messages. All formats sort lexicographically in chronological order.
 */

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Format a Date as YYYYMMDD_HHMMSS (local time). */
export function formatSnapshotTimestamp(date: Date): string {
  const y = date.getFullYear();
  const m = pad(date.getMonth() + 1);
  const d = pad(date.getDate());
  const h = pad(date.getHours());
  const min = pad(date.getMinutes());
  const s = pad(date.getSeconds());
  return `${y}${m}${d}_${h}${min}${s}`;
}

/** Format a Date as YYYY-MM-DD HH:MM:SS (local time). */
export function formatLogTimestamp(date: Date): string {
  const y = date.getFullYear();
  const m = pad(date.getMonth() + 1);
  const d = pad(date.getDate());
  const h = pad(date.getHours());
  const min = pad(date.getMinutes());
  const s = pad(date.getSeconds());
  return `${y}-${m}-${d} ${h}:${min}:${s}`;
}
