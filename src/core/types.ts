/**
 * tagdigest - Core Types
 *
 * Two flows share these shapes:
 * 1. Notes -> batches -> generated summaries (summarize)
 * 2. Generated summaries -> ranked excerpts (search, chat)
 */

// ============================================================================
// Notes
// ============================================================================

/**
 * The unit the batcher works on. Everything the batcher needs is here:
 * text for the size estimate and an optional calendar date for ordering.
 */
export interface NoteItem {
  content: string;
  title?: string;
  date: Date | null;            // null = undated
}

/**
 * Typed view of a note's front matter. Only the keys tagdigest reads are
 * kept; everything else in the header is dropped on parse.
 */
export interface NoteFrontmatter {
  title?: string;
  date?: string;
  hashtag?: string;
  tags: string[];
}

/** A vault note after parsing and hashtag extraction. */
export interface JournalEntry extends NoteItem {
  filePath: string;
  title: string;
  hashtags: ReadonlySet<string>;  // without the leading '#'
  frontmatter: NoteFrontmatter;
  rawContent: string;
}

// ============================================================================
// Batches
// ============================================================================

export interface DateRange {
  start: Date | null;
  end: Date | null;
}

export interface Batch<T extends NoteItem = NoteItem> {
  items: readonly T[];
  batchId: number;              // 1-based, contiguous in emission order
  totalBatches: number;         // floor(total / maxBatchSize) + 1, an estimate
  estimatedTokens: number;
  dateRange: DateRange;
}

// ============================================================================
// Summaries & Retrieval
// ============================================================================

/** A generated summary as read back from the summaries directory. */
export interface SummaryDocument {
  filename: string;
  content: string;
}

export interface SummaryMetadata {
  date: Date | null;
  hashtag: string | null;
}

export interface SearchResult {
  document: SummaryDocument;
  excerpt: string;
  date: Date | null;
  hashtag: string;              // 'unknown' when neither filename nor header names one
  score: number;
}

/** Scores a text against an already lower-cased query. */
export type RelevanceScorer = (text: string, query: string) => number;

// ============================================================================
// Chat
// ============================================================================

export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
  timestamp: Date;
}
