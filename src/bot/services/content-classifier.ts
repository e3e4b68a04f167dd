/**
 * Decides which enrichment path a message takes.
 *
 *   EMPTY       nothing but whitespace
 *   URL         contains an http(s) URL; the first one wins
 *   LONG_TEXT   more than LONG_TEXT_THRESHOLD characters, no URL
 *   SHORT_TEXT  everything else
 */

export const LONG_TEXT_THRESHOLD = 128;

export type Classification =
  | { tag: 'EMPTY' }
  | { tag: 'URL'; url: string }
  | { tag: 'LONG_TEXT' }
  | { tag: 'SHORT_TEXT' };

const URL_PATTERN = /https?:\/\/[^\s<>"'`]+/i;
const TRAILING_PUNCTUATION = /[.,;:!?)\]}]+$/;

/**
 * First http(s) URL in `text`, without sentence punctuation glued to its end.
 */
export function findFirstUrl(text: string): string | null {
  const match = URL_PATTERN.exec(text);
  if (!match) return null;

  const url = match[0].replace(TRAILING_PUNCTUATION, '');
  // "https://" alone, or only punctuation after the scheme
  return /^https?:\/\/[^/?#]+/i.test(url) ? url : null;
}

/** Length in code points, so an emoji counts once. */
function charLength(text: string): number {
  return Array.from(text).length;
}

export function classify(text: string): Classification {
  const stripped = text.trim();
  if (stripped.length === 0) return { tag: 'EMPTY' };

  const url = findFirstUrl(stripped);
  if (url) return { tag: 'URL', url };

  return charLength(stripped) > LONG_TEXT_THRESHOLD
    ? { tag: 'LONG_TEXT' }
    : { tag: 'SHORT_TEXT' };
}
