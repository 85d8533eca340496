/**
 * Plain-text helpers shared by the formatters
 *
 * @module utils
 */

export const StatusSymbols = Object.freeze({
  start: '▶',
  running: '●',
  success: '✔',
  failure: '✖',
  warning: '⚠',
  skipped: '⊘',
  info: 'ℹ',
});

/**
 * 850 → "850ms", 1520 → "1.5s", 75000 → "1m 15s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

export function divider(width = 60, char = '─'): string {
  return char.repeat(width);
}

export function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}
