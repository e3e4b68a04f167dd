/**
 * Cut `text` to at most `max` characters, ending in `...` when cut.
 * Counts code points, so surrogate pairs are never split.
 */
export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  if (chars.length <= max) return text;
  return chars.slice(0, max - 3).join('') + '...';
}

/** First `max` characters followed by `...` when longer. */
export function preview(text: string, max: number): string {
  const chars = Array.from(text);
  return chars.length > max ? `${chars.slice(0, max).join('')}...` : text;
}
