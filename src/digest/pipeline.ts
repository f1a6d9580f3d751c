/**
 * tagdigest - Digest Pipeline
 *
 * Phase 1 (plan): scan the vault, parse and filter notes, cut batches.
 * No model calls, so it is free to run and backs `--dry-run` and the
 * `plan_batches` MCP tool.
 *
 * Phase 2 (run): summarize the batches one after another and write the
 * merged summary file.
 */

import { EntryBatcher } from '../core/batcher.js';
import { TagdigestError } from '../core/errors.js';
import { NullLogger, type Logger } from '../core/logger.js';
import type { BatchSummarizer } from '../core/summarizer.js';
import type { Batch, JournalEntry } from '../core/types.js';
import type { SummaryWriter } from '../core/writer.js';
import { EntryParser } from '../ingest/parser.js';
import { scanVault, type ScanResult } from '../ingest/scanner.js';

// ============================================================================
// Types
// ============================================================================

export interface PlanOptions {
  vaultPath: string;
  hashtag: string;
  range: { start: Date; end: Date };
  maxBatchSize: number;
  maxTokensPerBatch: number;
  /** Group by date windows of this many days instead of by size. */
  daysPerBatch?: number;
  /** Replace maxBatchSize with the size suggested for the entries found. */
  optimize?: boolean;
  excludeDirs?: readonly string[];
  logger?: Logger;
}

export interface DigestPlan {
  hashtag: string;
  range: { start: Date; end: Date };
  scan: ScanResult;
  entries: JournalEntry[];
  batches: Batch<JournalEntry>[];
  batchSize: number;
  /** Batches over the size or token limit (a single oversized entry). */
  oversizedBatches: number[];
  describe: (batch: Batch) => string;
}

export interface BatchOutcome {
  batchId: number;
  requestTimeMs: number;
  error?: string;
}

export interface DigestResult {
  outputPath: string;
  outcomes: BatchOutcome[];
  entriesProcessed: number;
}

// ============================================================================
// Plan
// ============================================================================

export async function planDigest(options: PlanOptions): Promise<DigestPlan> {
  const logger = options.logger ?? new NullLogger();
  const hashtag = options.hashtag.replace(/^#+/, '');

  const scan = await scanVault(options.vaultPath, { excludeDirs: options.excludeDirs, logger });

  const parser = new EntryParser({
    targetHashtag: hashtag,
    startDate: options.range.start,
    endDate: options.range.end,
    logger,
  });
  const entries = await parser.parseFiles(scan.markdownFiles);

  let batcher = new EntryBatcher({
    maxBatchSize: options.maxBatchSize,
    maxTokensPerBatch: options.maxTokensPerBatch,
    logger,
  });
  if (options.optimize && entries.length > 0) {
    batcher = new EntryBatcher({
      maxBatchSize: batcher.optimizeBatchSize(entries),
      maxTokensPerBatch: options.maxTokensPerBatch,
      logger,
    });
  }

  const batches = options.daysPerBatch !== undefined
    ? batcher.createBatchesByDate(entries, options.daysPerBatch)
    : batcher.createBatches(entries);

  const oversizedBatches = batches
    .filter((batch) => !batcher.validateBatch(batch))
    .map((batch) => batch.batchId);

  return {
    hashtag,
    range: options.range,
    scan,
    entries,
    batches,
    batchSize: batcher.maxBatchSize,
    oversizedBatches,
    describe: (batch) => batcher.describeBatch(batch),
  };
}

// ============================================================================
// Run
// ============================================================================

/**
 * Summarize every batch of `plan` and write the result. Failed batches are
 * left out of the summary; if all of them fail nothing is written.
 */
export async function runDigest(
  plan: DigestPlan,
  deps: {
    summarizer: BatchSummarizer;
    writer: SummaryWriter;
    logger?: Logger;
    onBatch?: (batch: Batch, outcome: BatchOutcome) => void;
  }
): Promise<DigestResult> {
  const logger = deps.logger ?? new NullLogger();
  if (plan.batches.length === 0) {
    throw new TagdigestError(`No entries tagged #${plan.hashtag} to summarize`);
  }

  const summaries: string[] = [];
  const outcomes: BatchOutcome[] = [];

  for (const batch of plan.batches) {
    logger.debug(`Summarizing ${plan.describe(batch)}`);
    const response = await deps.summarizer.summarizeBatch(batch, {
      hashtag: plan.hashtag,
      dateRange: plan.range,
    });

    const outcome: BatchOutcome = { batchId: batch.batchId, requestTimeMs: response.requestTimeMs };
    if (response.error !== undefined) {
      outcome.error = response.error;
    } else {
      summaries.push(response.content);
    }
    outcomes.push(outcome);
    deps.onBatch?.(batch, outcome);
  }

  const failed = outcomes.filter((o) => o.error !== undefined);
  if (failed.length === outcomes.length) {
    throw new TagdigestError(`All ${outcomes.length} batches failed; first error: ${failed[0].error ?? 'unknown'}`);
  }
  if (failed.length > 0) {
    logger.warn(`${failed.length} of ${outcomes.length} batches failed and were left out of the summary`);
  }

  const outputPath = await deps.writer.writeSummary(summaries, {
    hashtag: plan.hashtag,
    startDate: plan.range.start,
    endDate: plan.range.end,
    model: deps.summarizer.model,
    entriesProcessed: plan.entries.length,
    batchCount: plan.batches.length,
  });

  return { outputPath, outcomes, entriesProcessed: plan.entries.length };
}
