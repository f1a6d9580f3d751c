/**
 * Keyword-frequency relevance between a query and a piece of text.
 */

const MIN_WORD_LENGTH = 3;
const EXPECTED_HITS_PER_WORD = 10;

/**
 * Score `text` against a lower-cased `query`.
 *
 * Each query word of 3+ characters contributes its occurrence count in the
 * text. The total is divided by (number of query words * 10), where short
 * words still count toward the divisor, then clamped to 1.0.
 */
export function scoreRelevance(text: string, query: string): number {
  const words = query.split(/\s+/).filter((w) => w.length > 0);
  if (words.length === 0) return 0;

  const haystack = text.toLowerCase();
  let hits = 0;

  for (const word of words) {
    if (word.length < MIN_WORD_LENGTH) continue;
    hits += countOccurrences(haystack, word);
  }

  return Math.min(hits / (words.length * EXPECTED_HITS_PER_WORD), 1.0);
}

/** Non-overlapping substring count. */
export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;

  let count = 0;
  let from = 0;
  for (;;) {
    const idx = haystack.indexOf(needle, from);
    if (idx === -1) return count;
    count++;
    from = idx + needle.length;
  }
}
