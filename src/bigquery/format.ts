const BYTE_UNIT = 1024;
const UNIT_PREFIXES = 'KMGTPE';
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

export function formatBytes(bytes: number): string {
  if (bytes < BYTE_UNIT) {
    return `${bytes} B`;
  }

  let div = BYTE_UNIT;
  let exp = 0;
  for (let n = Math.floor(bytes / BYTE_UNIT); n >= BYTE_UNIT; n = Math.floor(n / BYTE_UNIT)) {
    div *= BYTE_UNIT;
    exp++;
  }
  return `${(bytes / div).toFixed(1)} ${UNIT_PREFIXES.charAt(exp)}B`;
}

/**
 * Formats epoch milliseconds as a short local timestamp, e.g. "Jan 2 15:04".
 */
export function formatTime(epochMillis: number): string {
  if (!epochMillis) {
    return 'N/A';
  }
  const date = new Date(epochMillis);
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  return `${MONTHS[date.getMonth()]} ${date.getDate()} ${hours}:${minutes}`;
}

export function getTableTypeIcon(tableType: string): string {
  switch (tableType.toUpperCase()) {
    case 'TABLE':
      return '📋';
    case 'VIEW':
      return '👁️';
    case 'MATERIALIZED_VIEW':
      return '💎';
    default:
      return '❓';
  }
}

export function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}
