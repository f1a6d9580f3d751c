/**
 * Batch summarization
 *
 * Turns one Batch into a prompt, sends it to the generation client and
 * reports the outcome. Failures come back as a response with `error` set so
 * the caller can decide whether a partial summary is still worth writing.
 */

import { errorMessage } from './errors.js';
import type { GenerationClient } from './llm.js';
import { NullLogger, type Logger } from './logger.js';
import { formatDateRange, formatIsoDate } from './temporal.js';
import type { Batch, DateRange, NoteItem } from './types.js';

const MAX_ENTRY_CHARS = 1000;

export const EMPTY_BATCH_MESSAGE = 'No entries to summarize.';

export const SYSTEM_PROMPT = `You are a helpful assistant that creates concise, well-structured summaries of journal entries.

Your task is to summarize journal entries tagged with a specific hashtag, focusing on:
- Key activities and events
- Important decisions or insights
- Patterns or recurring themes
- Action items or follow-ups

Guidelines:
- Be concise but comprehensive
- Use bullet points for clarity
- Group related items together
- Maintain chronological order when relevant
- Focus on actionable insights
- Use professional but friendly tone

Format your response as clean markdown with appropriate headings and bullet points.`;

export interface SummarizationRequest {
  entries: readonly NoteItem[];
  hashtag: string;
  dateRange: DateRange;
  batchId: number;
  totalBatches: number;
}

export interface SummarizationResponse {
  content: string;
  model: string;
  requestTimeMs: number;
  error?: string;
}

/** Entries as `**date - title**` blocks separated by horizontal rules. */
export function formatEntries(entries: readonly NoteItem[]): string {
  return entries
    .map((entry) => {
      const date = entry.date ? formatIsoDate(entry.date) : 'Unknown date';
      let content = entry.content.slice(0, MAX_ENTRY_CHARS);
      if (entry.content.length > MAX_ENTRY_CHARS) {
        content += '... [truncated]';
      }
      return `**${date} - ${entry.title ?? 'Untitled'}**\n${content}`;
    })
    .join('\n\n---\n\n');
}

export function buildSummaryPrompt(request: SummarizationRequest): string {
  const hashtag = request.hashtag.replace(/^#/, '');
  const dateRange = formatDateRange(request.dateRange) ?? 'All dates';
  const batchInfo = request.totalBatches > 1
    ? `Batch ${request.batchId} of ${request.totalBatches}`
    : 'Single batch';

  return `Please summarize the following journal entries tagged with #${hashtag}:

**Date Range**: ${dateRange}
**Batch**: ${batchInfo}
**Total Entries**: ${request.entries.length}

${formatEntries(request.entries)}

Please provide a structured summary that captures the key points, themes, and insights from these entries.`;
}

export class BatchSummarizer {
  private logger: Logger;

  constructor(private client: GenerationClient, options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? new NullLogger();
  }

  get model(): string {
    return this.client.model;
  }

  /**
   * Summarize one batch. `dateRange` defaults to the batch's own range; pass
   * the requested reporting window to label every batch the same way.
   */
  async summarizeBatch(
    batch: Batch,
    options: { hashtag: string; dateRange?: DateRange }
  ): Promise<SummarizationResponse> {
    if (batch.items.length === 0) {
      return { content: EMPTY_BATCH_MESSAGE, model: this.client.model, requestTimeMs: 0 };
    }

    const prompt = buildSummaryPrompt({
      entries: batch.items,
      hashtag: options.hashtag,
      dateRange: options.dateRange ?? batch.dateRange,
      batchId: batch.batchId,
      totalBatches: batch.totalBatches,
    });

    const started = Date.now();
    try {
      const content = await this.client.generate(prompt, { system: SYSTEM_PROMPT });
      const requestTimeMs = Date.now() - started;
      this.logger.debug(`Batch ${batch.batchId} summarized in ${requestTimeMs}ms`);
      return { content, model: this.client.model, requestTimeMs };
    } catch (error) {
      const requestTimeMs = Date.now() - started;
      this.logger.error(`Summarization failed for batch ${batch.batchId}: ${errorMessage(error)}`);
      return { content: '', model: this.client.model, requestTimeMs, error: errorMessage(error) };
    }
  }
}
