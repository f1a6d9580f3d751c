/**
 * Summarize Command
 *
 * tagdigest summarize <vault> -t <hashtag>
 */

import type { Command } from 'commander';

import { DEFAULT_DAYS_PER_BATCH } from '../../core/batcher.js';
import { loadConfig, type ConfigOverrides } from '../../core/config.js';
import { createGenerationClient } from '../../core/llm.js';
import { createLogger } from '../../core/logger.js';
import { BatchSummarizer } from '../../core/summarizer.js';
import { formatDuration, formatIsoDate, resolveDateRange } from '../../core/temporal.js';
import { SummaryWriter } from '../../core/writer.js';
import { planDigest, runDigest } from '../../digest/pipeline.js';
import { c, colors } from '../colors.js';
import { exitWithError, parsePositiveInt, resolveSummariesDir } from '../helpers.js';

interface SummarizeOptions {
  tag: string;
  start?: string;
  end?: string;
  model?: string;
  output?: string;
  batchSize?: number;
  maxTokens?: number;
  byDate?: boolean | number;
  optimize?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
}

export function registerSummarizeCommand(program: Command): void {
  program
    .command('summarize')
    .description('Summarize the notes tagged with a hashtag over a date range')
    .argument('<vault>', 'Path to the vault')
    .requiredOption('-t, --tag <hashtag>', 'Hashtag to summarize (with or without #)')
    .option('--start <date>', 'Start date (YYYY-MM-DD, 7d, 2w, 1m, "last week"); default: last Monday week')
    .option('--end <date>', 'End date, inclusive; default: Sunday of the start week')
    .option('-m, --model <model>', 'Model (llama3.1:8b, gpt-4o-mini, claude-3-5-haiku-latest, ...)')
    .option('-o, --output <dir>', 'Directory for the summary file (default: <vault>/Summaries)')
    .option('--batch-size <n>', 'Maximum entries per batch', parsePositiveInt)
    .option('--max-tokens <n>', 'Maximum estimated tokens per batch', parsePositiveInt)
    .option('--by-date [days]', `Batch by date windows (default ${DEFAULT_DAYS_PER_BATCH} days)`, parsePositiveInt)
    .option('--optimize', 'Pick the batch size from the average entry size')
    .option('--dry-run', 'Show the batches without calling the model')
    .option('-v, --verbose', 'Debug logging')
    .action(async (vault: string, options: SummarizeOptions) => {
      const logger = createLogger(Boolean(options.verbose));

      try {
        const overrides: ConfigOverrides = {};
        if (options.model) overrides.model = options.model;
        if (options.batchSize) overrides.maxBatchSize = options.batchSize;
        if (options.maxTokens) overrides.maxTokensPerBatch = options.maxTokens;
        const config = await loadConfig({ overrides });

        const range = resolveDateRange(options.start, options.end);
        const daysPerBatch = options.byDate === undefined || options.byDate === false
          ? undefined
          : options.byDate === true ? DEFAULT_DAYS_PER_BATCH : options.byDate;

        const plan = await planDigest({
          vaultPath: vault,
          hashtag: options.tag,
          range,
          maxBatchSize: config.maxBatchSize,
          maxTokensPerBatch: config.maxTokensPerBatch,
          daysPerBatch,
          optimize: options.optimize,
          logger,
        });

        console.log(`\n${c.title('tagdigest summarize')}`);
        console.log(`  Tag:     ${c.hashtag(plan.hashtag)}`);
        console.log(`  Range:   ${formatIsoDate(range.start)} to ${formatIsoDate(range.end)}`);
        console.log(`  Notes:   ${plan.scan.markdownFiles.length} scanned, ${plan.entries.length} matching`);
        console.log(`  Batches: ${plan.batches.length} (batch size ${plan.batchSize}, ${config.maxTokensPerBatch} tokens)\n`);

        if (plan.entries.length === 0) {
          console.log(c.warning(`No entries tagged #${plan.hashtag} in this range.`));
          return;
        }

        for (const batch of plan.batches) {
          const flag = plan.oversizedBatches.includes(batch.batchId) ? c.warning(' (over limit)') : '';
          console.log(`  ${c.dim(plan.describe(batch))}${flag}`);
        }
        console.log('');

        if (options.dryRun) {
          console.log(c.dim('Dry run: no summary generated.'));
          return;
        }

        const client = createGenerationClient(config, logger);
        const status = await client.checkConnection();
        if (!status.ok) {
          exitWithError(status.message);
        }

        const outputDir = resolveSummariesDir({
          explicit: options.output,
          configured: config.summariesDir,
          vaultPath: vault,
        });
        const started = Date.now();

        const result = await runDigest(plan, {
          summarizer: new BatchSummarizer(client, { logger }),
          writer: new SummaryWriter(outputDir, { logger }),
          logger,
          onBatch: (batch, outcome) => {
            const mark = outcome.error ? c.error('✗') : c.success('✓');
            const detail = outcome.error ?? formatDuration(outcome.requestTimeMs);
            console.log(`  ${mark} Batch ${batch.batchId}/${plan.batches.length} ${colors.dim}${detail}${colors.reset}`);
          },
        });

        console.log(`\n${c.success('Summary written:')} ${c.file(result.outputPath)}`);
        console.log(c.dim(`${result.entriesProcessed} entries in ${formatDuration(Date.now() - started)}`));
      } catch (error) {
        exitWithError(error);
      }
    });
}
