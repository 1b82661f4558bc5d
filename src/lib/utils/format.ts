/** Human-readable duration: 500ms, 5s, 1m 30s, 1h 2m */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.max(0, Math.round(ms))}ms`;

  const totalSec = Math.floor(ms / 1000);
  const hours = Math.floor(totalSec / 3600);
  const minutes = Math.floor((totalSec % 3600) / 60);
  const seconds = totalSec % 60;

  if (hours > 0) return minutes > 0 ? `${hours}h ${minutes}m` : `${hours}h`;
  if (minutes > 0) return seconds > 0 ? `${minutes}m ${seconds}s` : `${minutes}m`;
  return `${seconds}s`;
}

/** Truncate to a single line of at most `max` characters */
export function truncateLine(text: string, max = 60): string {
  const line = text.split('\n')[0] ?? '';
  const suffix = line.length < text.length ? '…' : '';
  if (line.length + suffix.length <= max) return line + suffix;
  return `${line.slice(0, max - 1)}…`;
}
