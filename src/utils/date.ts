export function utcNow(): string {
  return new Date().toISOString();
}

/** Compact UTC day stamp, e.g. 20261018. */
export function utcDayStamp(date: Date = new Date()): string {
  return date.toISOString().slice(0, 10).replace(/-/g, '');
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}
