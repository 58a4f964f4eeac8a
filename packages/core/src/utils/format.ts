const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;

/**
 * Human-readable byte size with two decimals, e.g. "1.50 KB".
 */
export function formatSize(sizeBytes: number): string {
  if (sizeBytes === 0) {
    return '0 B';
  }

  let size = sizeBytes;
  let unit = 0;
  while (size >= 1024 && unit < SIZE_UNITS.length - 1) {
    size /= 1024;
    unit++;
  }

  return `${size.toFixed(2)} ${SIZE_UNITS[unit]}`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local timestamp as YYYYMMDD_HHMMSS, used in archive and snapshot file names.
 */
export function formatTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
