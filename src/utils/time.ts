/**
 * Format a duration in a human-readable form (e.g. "1.25s", "2m 5s")
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * UTC calendar day key, e.g. "2026-10-19"
 */
export function utcDayKey(timestamp: number = Date.now()): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
