/**
 * Summary retrieval
 *
 * Keyword search over generated summaries. Each match carries the single
 * paragraph that best fits the query, plus the date and hashtag the summary
 * was written for.
 */

import path from 'path';

import { parseFrontmatter } from './frontmatter.js';
import { scoreRelevance } from './relevance.js';
import { parseCalendarDate } from './temporal.js';
import type { RelevanceScorer, SearchResult, SummaryDocument, SummaryMetadata } from './types.js';

export const DEFAULT_SEARCH_LIMIT = 5;
export const DEFAULT_SNIPPET_LENGTH = 300;
export const UNKNOWN_HASHTAG = 'unknown';

const MIN_PARAGRAPH_LENGTH = 10;
const FILENAME_DATE_PATTERN = /(\d{4}-\d{2}-\d{2})/;
const FILENAME_HASHTAG_PATTERN = /#([\p{L}\p{N}_]+)/u;

export interface SearchOptions {
  limit?: number;
  scorer?: RelevanceScorer;
  maxSnippetLength?: number;
}

/**
 * Rank `documents` against `query`.
 *
 * Documents scoring 0 are dropped. Results are sorted by score, highest
 * first; equal scores keep the order the documents were given in.
 */
export function searchDocuments(
  documents: readonly SummaryDocument[],
  query: string,
  options: SearchOptions = {}
): SearchResult[] {
  const {
    limit = DEFAULT_SEARCH_LIMIT,
    scorer = scoreRelevance,
    maxSnippetLength = DEFAULT_SNIPPET_LENGTH,
  } = options;
  const queryLower = query.toLowerCase();
  const results: SearchResult[] = [];

  for (const document of documents) {
    const score = scorer(document.content, queryLower);
    if (score <= 0) continue;

    const metadata = extractSummaryMetadata(document.filename, document.content);

    results.push({
      document,
      excerpt: extractRelevantSnippet(document.content, queryLower, { scorer, maxLength: maxSnippetLength }),
      date: metadata.date,
      hashtag: metadata.hashtag ?? UNKNOWN_HASHTAG,
      score,
    });
  }

  results.sort((a, b) => b.score - a.score);
  return results.slice(0, Math.max(0, limit));
}

/**
 * Date and hashtag for a summary file.
 *
 * The filename stem supplies `YYYY-MM-DD` and `#tag` when present; values in
 * the front matter header take precedence. Anything unparseable is left
 * null.
 */
export function extractSummaryMetadata(filename: string, content: string): SummaryMetadata {
  const stem = path.basename(filename, path.extname(filename));
  let date: Date | null = null;
  let hashtag: string | null = null;

  const dateMatch = stem.match(FILENAME_DATE_PATTERN);
  if (dateMatch) {
    date = parseCalendarDate(dateMatch[1]);
  }

  const hashtagMatch = stem.match(FILENAME_HASHTAG_PATTERN);
  if (hashtagMatch) {
    hashtag = hashtagMatch[1];
  }

  const { frontmatter } = parseFrontmatter(content);
  if (frontmatter) {
    const headerDate = frontmatter.date ? parseCalendarDate(frontmatter.date) : null;
    if (headerDate) {
      date = headerDate;
    }
    if (frontmatter.hashtag) {
      hashtag = frontmatter.hashtag;
    }
  }

  return { date, hashtag };
}

/**
 * The paragraph of `content` that scores highest against `query`.
 *
 * Paragraphs are separated by blank lines; ones shorter than 10 characters
 * are ignored. The first paragraph wins a tie. Returns '' when no paragraph
 * scores above 0.
 */
export function extractRelevantSnippet(
  content: string,
  query: string,
  options: { scorer?: RelevanceScorer; maxLength?: number } = {}
): string {
  const { scorer = scoreRelevance, maxLength = DEFAULT_SNIPPET_LENGTH } = options;
  const paragraphs = content.split(/\r?\n[ \t]*\r?\n/);
  let best = '';
  let bestScore = 0;

  for (const paragraph of paragraphs) {
    if (paragraph.trim().length < MIN_PARAGRAPH_LENGTH) continue;

    const score = scorer(paragraph, query);
    if (score > bestScore) {
      bestScore = score;
      best = paragraph;
    }
  }

  if (best.length > maxLength) {
    best = best.slice(0, maxLength) + '...';
  }

  return best.trim();
}
