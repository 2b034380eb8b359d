/**
 * Formatter Utilities
 *
 * Shared helpers for console and file output.
 */

export const RULE = '='.repeat(80);

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * Local time as `YYYYMMDD_HHMMSS`, for file names
 */
export function formatCompactTimestamp(date: Date): string {
  return formatTimestamp(date).replace(/-|:/g, '').replace(' ', '_');
}

/**
 * `Key: count` pairs in first-seen order
 */
export function formatDistribution(values: readonly string[]): string {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return [...counts].map(([key, count]) => `${key}: ${count}`).join(', ');
}

/**
 * Push up to `limit` formatted items, then a "... and N more" line
 */
export function pushLimited<T>(
  lines: string[],
  items: readonly T[],
  limit: number,
  format: (item: T, index: number) => string | string[],
  more: (remaining: number) => string
): void {
  items.slice(0, limit).forEach((item, index) => {
    const formatted = format(item, index);
    lines.push(...(Array.isArray(formatted) ? formatted : [formatted]));
  });
  if (items.length > limit) {
    lines.push(more(items.length - limit));
  }
}
