const UNITS = ['KB', 'MB', 'GB', 'TB'] as const;

/** `512 B`, `1.50 KB`, `2.00 MB`, ... (powers of 1024, TB is the largest unit) */
export function humanSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return `${value.toFixed(2)} ${UNITS[unit]}`;
}
