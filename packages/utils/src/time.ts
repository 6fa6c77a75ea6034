/**
 * Time Utilities
 */

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }

  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}

/**
 * Parse an `HH:MM:SS.frac` timestamp to seconds, or null if it does not match
 */
export function parseTimestamp(timestamp: string): number | null {
  const match = timestamp.match(/^(\d+):(\d+):(\d+(?:\.\d+)?)$/);
  if (!match) return null;

  const hours = parseInt(match[1] ?? '0', 10);
  const minutes = parseInt(match[2] ?? '0', 10);
  const seconds = parseFloat(match[3] ?? '0');

  return hours * 3600 + minutes * 60 + seconds;
}
