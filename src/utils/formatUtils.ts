/**
 * Display formatting helpers for payload fields
 */

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'] as const;

/**
 * Formats a byte count with the largest unit that keeps the value under 1024,
 * e.g. 3000000000 -> "2.8 GB". Zero or missing sizes render as "--".
 */
export function formatBytes(bytes: number | null | undefined): string {
  if (!bytes || !Number.isFinite(bytes)) {
    return '--';
  }

  let size = bytes;
  for (const unit of BYTE_UNITS.slice(0, -1)) {
    // Compare the rounded value so 1023.96 KB is shown as 1.0 MB, not 1024.0 KB
    if (Math.abs(Number(size.toFixed(1))) < 1024) {
      return `${size.toFixed(1)} ${unit}`;
    }
    size /= 1024;
  }
  return `${size.toFixed(1)} PB`;
}

/**
 * Relative time since an ISO timestamp: "Just now", "5 min ago", "1 hour ago", "3 days ago".
 * Missing or unparsable timestamps yield an empty string.
 */
export function formatRelativeTime(date: string | null | undefined, now: Date): string {
  if (!date) {
    return '';
  }

  const eventTime = Date.parse(date);
  if (Number.isNaN(eventTime)) {
    return '';
  }

  const seconds = Math.floor((now.getTime() - eventTime) / 1000);

  if (seconds < 60) {
    return 'Just now';
  }
  if (seconds < 3600) {
    return `${Math.floor(seconds / 60)} min ago`;
  }
  if (seconds < 86400) {
    const hours = Math.floor(seconds / 3600);
    return `${hours} hour${hours !== 1 ? 's' : ''} ago`;
  }
  const days = Math.floor(seconds / 86400);
  return `${days} day${days !== 1 ? 's' : ''} ago`;
}

/**
 * Download progress in whole percent, 0 when the size is unknown
 */
export function calculateProgress(size: number | undefined, sizeleft: number | undefined): number {
  if (!size || size <= 0) {
    return 0;
  }
  const progress = Math.round(((size - (sizeleft ?? 0)) / size) * 100);
  return Math.min(100, Math.max(0, progress));
}

/**
 * Two-digit zero padding used in episode tags (S01E02)
 */
export function padNumber(value: number | undefined): string {
  return String(value ?? 0).padStart(2, '0');
}

export function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
