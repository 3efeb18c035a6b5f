/**
 * Format a per-second rate or a per-op size with one decimal
 * @param rate - e.g. ops/s or KB/op
 * @returns Formatted string (e.g., "125.5")
 */
export function formatRate(rate: number): string {
  return rate.toFixed(1);
}

/**
 * Format an average latency already expressed in milliseconds
 * @returns Formatted string (e.g., "12.3")
 */
export function formatDuration(ms: number): string {
  return ms.toFixed(1);
}

/**
 * Format a KB/s rate as MB/s (1 MB = 1024 KB)
 * @returns Formatted string (e.g., "2.5")
 */
export function formatBandwidth(kbPerSec: number): string {
  return (kbPerSec / 1024).toFixed(1);
}

/**
 * Format a ratio as a percentage of its total, 0 when the total is not positive
 * @returns Formatted string (e.g., "12.5%")
 */
export function formatShare(part: number, total: number): string {
  const percent = total > 0 ? (part / total) * 100 : 0;
  return `${percent.toFixed(1)}%`;
}

/**
 * Format a byte count in binary units (1 KiB = 1024 B), two decimals
 *
 * @returns e.g. "125.50 MiB"
 */
export function formatBytes(bytes: number): string {
  const units = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(2)} ${units[unit]}`;
}
