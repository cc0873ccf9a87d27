/**
 * Rate & Size Formatting
 *
 * Converts raw counters into the fixed-width human units printed by the
 * terminal dashboard. Byte units step by 1024, bit units by 1000.
 */

const BYTE_UNITS = ['B', 'KB', 'MB'] as const;

/** Right-align a number to 7 characters with two decimals. */
function pad7(value: number): string {
  return value.toFixed(2).padStart(7, ' ');
}

/**
 * Format a byte count, e.g. `1536` -> `'   1.50 KB'`.
 * Values past the MB range are reported in GB.
 */
export function formatBytes(size: number): string {
  let value = size;
  for (const unit of BYTE_UNITS) {
    if (value < 1024) return `${pad7(value)} ${unit}`;
    value /= 1024;
  }
  return `${pad7(value)} GB`;
}

/**
 * Format a byte rate as both bytes/sec and bits/sec,
 * e.g. `2048` -> `'   2.00 KB/s (  16.38 kbps)'`.
 */
export function formatRate(bytesPerSec: number): string {
  let bytes = bytesPerSec;
  let byteUnit = 'B/s';
  if (bytes >= 1024) {
    bytes /= 1024;
    byteUnit = 'KB/s';
  }
  if (bytes >= 1024) {
    bytes /= 1024;
    byteUnit = 'MB/s';
  }

  let bits = bytesPerSec * 8;
  let bitUnit = 'bps';
  if (bits >= 1000) {
    bits /= 1000;
    bitUnit = 'kbps';
  }
  if (bits >= 1000) {
    bits /= 1000;
    bitUnit = 'Mbps';
  }

  return `${pad7(bytes)} ${byteUnit} (${pad7(bits)} ${bitUnit})`;
}

/** Label for a rate window: `60` -> `'60s'`, `300` -> `'5m'`, `3600` -> `'1h'`. */
export function formatInterval(seconds: number): string {
  if (seconds % 3600 === 0) return `${seconds / 3600}h`;
  if (seconds % 60 === 0 && seconds >= 60) return `${seconds / 60}m`;
  return `${seconds}s`;
}

/** Seconds with one decimal, e.g. `124.5` -> `'124.5s'`. */
export function formatElapsed(seconds: number): string {
  return `${seconds.toFixed(1)}s`;
}
