/**
 * Plan Batches Handler - the batches a summarize run would send, without sending them
 */

import path from 'path';

import { formatIsoDate, resolveDateRange } from '../../core/temporal.js';
import { planDigest } from '../../digest/pipeline.js';
import type { PlanBatchesArgs } from '../tools.js';
import type { ToolContext } from './context.js';

export async function handlePlanBatches(
  context: ToolContext,
  args: PlanBatchesArgs
): Promise<unknown> {
  const range = resolveDateRange(args.start, args.end, context.now());

  const plan = await planDigest({
    vaultPath: args.vault_path,
    hashtag: args.hashtag,
    range,
    maxBatchSize: args.max_batch_size ?? context.config.maxBatchSize,
    maxTokensPerBatch: args.max_tokens_per_batch ?? context.config.maxTokensPerBatch,
    daysPerBatch: args.days_per_batch,
    logger: context.logger,
  });

  return {
    hashtag: plan.hashtag,
    range: { start: formatIsoDate(range.start), end: formatIsoDate(range.end) },
    notes_scanned: plan.scan.markdownFiles.length,
    entries: plan.entries.length,
    batch_size: plan.batchSize,
    batches: plan.batches.map((batch) => ({
      batch_id: batch.batchId,
      description: plan.describe(batch),
      entries: batch.items.length,
      estimated_tokens: batch.estimatedTokens,
      over_limit: plan.oversizedBatches.includes(batch.batchId),
      notes: batch.items.map((entry) => path.relative(plan.scan.vaultPath, entry.filePath)),
    })),
  };
}
