/**
 * Summary Writer
 *
 * Writes the merged batch summaries for one hashtag and reporting window to
 * `Week-YYYY-MM-DD-<hashtag>.md`, with a YAML header the retriever reads back.
 */

import { mkdir, readdir, readFile, stat, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';

import { errorMessage } from './errors.js';
import { parseFrontmatter, stringifyFrontmatter } from './frontmatter.js';
import { NullLogger, type Logger } from './logger.js';
import { formatIsoDate } from './temporal.js';
import type { NoteFrontmatter } from './types.js';

export const NO_CONTENT_MESSAGE = 'No content to summarize.';

export interface SummaryWriteRequest {
  hashtag: string;
  startDate: Date;
  endDate: Date;
  model: string;
  entriesProcessed: number;
  batchCount: number;
  totalTokens?: number;
}

export type SummaryInfo =
  | { path: string; size: number; modified: Date; frontmatter: NoteFrontmatter | null }
  | { path: string; error: string };

export function summaryFilename(hashtag: string, startDate: Date): string {
  return `Week-${formatIsoDate(startDate)}-${hashtag.replace(/^#/, '')}.md`;
}

export function summaryTitle(hashtag: string, startDate: Date, endDate: Date): string {
  return `Week Summary - #${hashtag.replace(/^#/, '')} (${formatIsoDate(startDate)} to ${formatIsoDate(endDate)})`;
}

/**
 * One summary is used as is. Several become numbered `### Batch i` sections;
 * blank ones are skipped but keep their number.
 */
export function mergeBatchSummaries(summaries: readonly string[]): string {
  if (summaries.length === 0) return NO_CONTENT_MESSAGE;
  if (summaries.length === 1) return summaries[0];

  const sections: string[] = [];
  summaries.forEach((summary, index) => {
    if (summary.trim()) {
      sections.push(`### Batch ${index + 1}\n${summary.trim()}\n`);
    }
  });
  return sections.join('\n');
}

function formatTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}

export class SummaryWriter {
  private logger: Logger;
  private now: () => Date;

  constructor(
    readonly outputDir: string,
    options: { logger?: Logger; now?: () => Date } = {}
  ) {
    this.logger = options.logger ?? new NullLogger();
    this.now = options.now ?? (() => new Date());
  }

  renderSummary(summaries: readonly string[], request: SummaryWriteRequest): string {
    const hashtag = request.hashtag.replace(/^#/, '');
    const title = summaryTitle(hashtag, request.startDate, request.endDate);
    const generatedAt = this.now();

    const header: Record<string, string | number> = {
      title,
      date: formatIsoDate(generatedAt),
      model: request.model,
      hashtag,
      entries_processed: request.entriesProcessed,
      generation_time: generatedAt.toISOString(),
      batch_count: request.batchCount,
    };
    if (request.totalTokens) {
      header.total_tokens = request.totalTokens;
    }

    const lines = [
      stringifyFrontmatter(header),
      `# ${title}`,
      '',
      mergeBatchSummaries(summaries),
      '',
      '## Summary Statistics',
      `- **Total Entries**: ${request.entriesProcessed}`,
      `- **Batches Processed**: ${request.batchCount}`,
      `- **Model Used**: ${request.model}`,
      `- **Generation Time**: ${formatTimestamp(generatedAt)}`,
    ];
    if (request.totalTokens) {
      lines.push(`- **Total Tokens**: ${request.totalTokens}`);
    }

    return lines.join('\n') + '\n';
  }

  /**
   * Write the summary file, replacing any earlier one for the same week and
   * hashtag. Returns the path written.
   */
  async writeSummary(summaries: readonly string[], request: SummaryWriteRequest): Promise<string> {
    await mkdir(this.outputDir, { recursive: true });
    const filePath = path.join(this.outputDir, summaryFilename(request.hashtag, request.startDate));

    try {
      await writeFile(filePath, this.renderSummary(summaries, request), 'utf-8');
    } catch (error) {
      this.logger.error(`Failed to write summary: ${errorMessage(error)}`);
      throw error;
    }

    this.logger.info(`Summary written to: ${filePath}`);
    return filePath;
  }

  /** Markdown files in the output directory, sorted by name. */
  async listSummaries(): Promise<string[]> {
    if (!existsSync(this.outputDir)) return [];

    const entries = await readdir(this.outputDir, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile() && e.name.endsWith('.md'))
      .map((e) => e.name)
      .sort()
      .map((name) => path.join(this.outputDir, name));
  }

  async getSummaryInfo(summaryPath: string): Promise<SummaryInfo> {
    try {
      const [content, stats] = await Promise.all([readFile(summaryPath, 'utf-8'), stat(summaryPath)]);
      return {
        path: summaryPath,
        size: stats.size,
        modified: stats.mtime,
        frontmatter: parseFrontmatter(content).frontmatter,
      };
    } catch (error) {
      this.logger.warn(`Failed to read summary info for ${summaryPath}: ${errorMessage(error)}`);
      return { path: summaryPath, error: errorMessage(error) };
    }
  }
}
