/**
 * Human-readable formatting helpers
 */

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const totalSeconds = Math.floor(ms / 1000);
  if (totalSeconds < 60) {
    return `${(ms / 1000).toFixed(1)}s`;
  }

  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes < 60) {
    return `${minutes}m ${seconds}s`;
  }

  const hours = Math.floor(minutes / 60);
  return `${hours}h ${minutes % 60}m`;
}

/**
 * ISO date without milliseconds, or "-" when unknown
 */
export function formatTimestamp(date: Date | undefined): string {
  if (!date) return "-";
  return date.toISOString().substring(0, 19).replace("T", " ");
}
