/**
 * Entry batching for summarization.
 *
 * Notes are grouped so that each generation request stays within both an
 * entry count and a token budget. A calendar-window variant groups notes by
 * week (or any span of days) instead.
 */

import { estimateItemTokens } from './estimator.js';
import { NullLogger, type Logger } from './logger.js';
import { daysBetween, formatIsoDate } from './temporal.js';
import type { Batch, DateRange, NoteItem } from './types.js';

export const DEFAULT_MAX_BATCH_SIZE = 20;
export const DEFAULT_MAX_TOKENS_PER_BATCH = 4000;
export const DEFAULT_DAYS_PER_BATCH = 7;
export const DEFAULT_TARGET_TOKENS = 3000;

const MIN_SUGGESTED_BATCH_SIZE = 5;
const MAX_SUGGESTED_BATCH_SIZE = 50;

export interface BatcherOptions {
  /** Maximum entries per batch (>= 1) */
  maxBatchSize?: number;
  /** Maximum estimated tokens per batch (>= 1) */
  maxTokensPerBatch?: number;
  logger?: Logger;
}

/**
 * Sort by date ascending with undated items first. Array#sort is stable, so
 * items sharing a date (or both undated) keep their input order.
 */
function sortByDate<T extends NoteItem>(items: readonly T[]): T[] {
  const key = (item: T): number => (item.date ? item.date.getTime() : Number.NEGATIVE_INFINITY);
  return [...items].sort((a, b) => {
    const ka = key(a);
    const kb = key(b);
    if (ka === kb) return 0;
    return ka < kb ? -1 : 1;
  });
}

export class EntryBatcher {
  readonly maxBatchSize: number;
  readonly maxTokensPerBatch: number;
  private logger: Logger;

  constructor(options: BatcherOptions = {}) {
    this.maxBatchSize = options.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE;
    this.maxTokensPerBatch = options.maxTokensPerBatch ?? DEFAULT_MAX_TOKENS_PER_BATCH;
    this.logger = options.logger ?? new NullLogger();

    this.logger.debug(`Batcher: max_size=${this.maxBatchSize}, max_tokens=${this.maxTokensPerBatch}`);
  }

  /**
   * Greedy single pass under both limits.
   *
   * A batch is closed when it already holds `maxBatchSize` entries or the next
   * entry would push it over `maxTokensPerBatch`. The budget check only closes
   * a non-empty batch, so one oversized entry still goes out on its own.
   */
  createBatches<T extends NoteItem>(items: readonly T[]): Batch<T>[] {
    if (items.length === 0) {
      this.logger.debug('No entries to batch');
      return [];
    }

    const sorted = sortByDate(items);
    const batches: Batch<T>[] = [];
    let current: T[] = [];
    let currentTokens = 0;

    for (const item of sorted) {
      const itemTokens = estimateItemTokens(item);

      if (current.length >= this.maxBatchSize || currentTokens + itemTokens > this.maxTokensPerBatch) {
        if (current.length > 0) {
          batches.push(this.buildBatch(current, batches.length + 1, items.length));
          current = [];
          currentTokens = 0;
        }
      }

      current.push(item);
      currentTokens += itemTokens;
    }

    if (current.length > 0) {
      batches.push(this.buildBatch(current, batches.length + 1, items.length));
    }

    this.logger.info(`Created ${batches.length} batches from ${items.length} entries`);
    return batches;
  }

  /**
   * Group entries into windows of `daysPerBatch` days.
   *
   * A window opens at its first dated entry and closes at the first entry
   * `daysPerBatch` or more whole days later. Undated entries close the open
   * window and collect in their own batch until the next dated entry.
   */
  createBatchesByDate<T extends NoteItem>(
    items: readonly T[],
    daysPerBatch: number = DEFAULT_DAYS_PER_BATCH
  ): Batch<T>[] {
    if (items.length === 0) {
      return [];
    }

    const sorted = sortByDate(items);
    const batches: Batch<T>[] = [];
    let current: T[] = [];
    let windowStart: Date | null = null;

    const flush = (): void => {
      if (current.length > 0) {
        batches.push(this.buildBatch(current, batches.length + 1, items.length));
        current = [];
      }
    };

    for (const item of sorted) {
      if (!item.date) {
        if (windowStart) {
          flush();
          windowStart = null;
        }
        current.push(item);
        continue;
      }

      if (windowStart === null || daysBetween(windowStart, item.date) >= daysPerBatch) {
        flush();
        windowStart = item.date;
      }

      current.push(item);
    }

    flush();

    this.logger.info(`Created ${batches.length} date-based batches from ${items.length} entries`);
    return batches;
  }

  /**
   * Suggest a batch size that would put roughly `targetTokens` in each batch,
   * given the average entry size. Clamped to [5, 50]; never applied
   * automatically.
   */
  optimizeBatchSize(items: readonly NoteItem[], targetTokens: number = DEFAULT_TARGET_TOKENS): number {
    if (items.length === 0) {
      return this.maxBatchSize;
    }

    const totalTokens = items.reduce((sum, item) => sum + estimateItemTokens(item), 0);
    const avgTokens = totalTokens / items.length;
    const suggested = Math.round(targetTokens / avgTokens);
    const clamped = Math.max(MIN_SUGGESTED_BATCH_SIZE, Math.min(suggested, MAX_SUGGESTED_BATCH_SIZE));

    this.logger.info(`Optimized batch size: ${clamped} (avg tokens per entry: ${avgTokens.toFixed(1)})`);
    return clamped;
  }

  /**
   * Check a batch against this batcher's limits. Batches from createBatches
   * can fail this when a single entry exceeds the token budget.
   */
  validateBatch(batch: Batch): boolean {
    if (batch.items.length > this.maxBatchSize) {
      this.logger.warn(`Batch ${batch.batchId} exceeds size limit: ${batch.items.length} > ${this.maxBatchSize}`);
      return false;
    }

    if (batch.estimatedTokens > this.maxTokensPerBatch) {
      this.logger.warn(`Batch ${batch.batchId} exceeds token limit: ${batch.estimatedTokens} > ${this.maxTokensPerBatch}`);
      return false;
    }

    return true;
  }

  /** One-line description for progress output. */
  describeBatch(batch: Batch): string {
    let summary = `Batch ${batch.batchId}/${batch.totalBatches}: ${batch.items.length} entries, ~${batch.estimatedTokens} tokens`;

    const { start, end } = batch.dateRange;
    if (start && end) {
      summary += start.getTime() === end.getTime()
        ? `, date: ${formatIsoDate(start)}`
        : `, dates: ${formatIsoDate(start)} to ${formatIsoDate(end)}`;
    }

    return summary;
  }

  private buildBatch<T extends NoteItem>(items: T[], batchId: number, totalItems: number): Batch<T> {
    return {
      items,
      batchId,
      // Estimate from overall volume, not a recount of the batches produced
      totalBatches: Math.floor(totalItems / this.maxBatchSize) + 1,
      estimatedTokens: items.reduce((sum, item) => sum + estimateItemTokens(item), 0),
      dateRange: computeDateRange(items),
    };
  }
}

export function computeDateRange(items: readonly NoteItem[]): DateRange {
  let start: Date | null = null;
  let end: Date | null = null;

  for (const item of items) {
    if (!item.date) continue;
    if (!start || item.date.getTime() < start.getTime()) start = item.date;
    if (!end || item.date.getTime() > end.getTime()) end = item.date;
  }

  return { start, end };
}
