import { describe, expect, it } from 'vitest';

import type { GenerateOptions, GenerationClient } from './llm.js';
import {
  BatchSummarizer,
  EMPTY_BATCH_MESSAGE,
  SYSTEM_PROMPT,
  buildSummaryPrompt,
  formatEntries,
} from './summarizer.js';
import type { Batch, NoteItem } from './types.js';

const day = (iso: string): Date => new Date(`${iso}T00:00:00.000Z`);

class FakeClient implements GenerationClient {
  readonly provider = 'ollama' as const;
  readonly model = 'fake-model';
  calls: Array<{ prompt: string; options?: GenerateOptions }> = [];

  constructor(private reply: () => Promise<string>) {}

  async generate(prompt: string, options?: GenerateOptions): Promise<string> {
    this.calls.push({ prompt, options });
    return this.reply();
  }

  async checkConnection() {
    return { ok: true, message: 'fake' };
  }
}

function batchOf(items: NoteItem[], batchId = 1, totalBatches = 1): Batch {
  return {
    items,
    batchId,
    totalBatches,
    estimatedTokens: 100,
    dateRange: { start: null, end: null },
  };
}

const standup: NoteItem = { title: 'Standup', content: 'Met with the team', date: day('2024-01-15') };

describe('formatEntries', () => {
  it('should fall back to placeholders for missing date and title', () => {
    expect(formatEntries([{ content: 'Loose thought', date: null }])).toBe('**Unknown date - Untitled**\nLoose thought');
  });

  it('should truncate long entries and separate entries with a rule', () => {
    const long: NoteItem = { title: 'Long', content: 'a'.repeat(1001), date: null };
    const text = formatEntries([standup, long]);

    expect(text).toBe(
      `**2024-01-15 - Standup**\nMet with the team\n\n---\n\n**Unknown date - Long**\n${'a'.repeat(1000)}... [truncated]`
    );
  });
});

describe('buildSummaryPrompt', () => {
  it('should describe a single batch with no range', () => {
    const prompt = buildSummaryPrompt({
      entries: [standup],
      hashtag: '#work',
      dateRange: { start: null, end: null },
      batchId: 1,
      totalBatches: 1,
    });

    expect(prompt).toBe(
      'Please summarize the following journal entries tagged with #work:\n\n' +
        '**Date Range**: All dates\n' +
        '**Batch**: Single batch\n' +
        '**Total Entries**: 1\n\n' +
        '**2024-01-15 - Standup**\nMet with the team\n\n' +
        'Please provide a structured summary that captures the key points, themes, and insights from these entries.'
    );
  });

  it('should number batches when there are several', () => {
    const prompt = buildSummaryPrompt({
      entries: [standup],
      hashtag: 'work',
      dateRange: { start: day('2024-01-15'), end: day('2024-01-21') },
      batchId: 2,
      totalBatches: 3,
    });

    expect(prompt).toContain('**Date Range**: 2024-01-15 to 2024-01-21\n**Batch**: Batch 2 of 3\n');
  });
});

describe('BatchSummarizer', () => {
  it('should not call the client for an empty batch', async () => {
    const client = new FakeClient(async () => 'unused');
    const response = await new BatchSummarizer(client).summarizeBatch(batchOf([]), { hashtag: 'work' });

    expect(response).toEqual({ content: EMPTY_BATCH_MESSAGE, model: 'fake-model', requestTimeMs: 0 });
    expect(client.calls).toHaveLength(0);
  });

  it('should send the prompt with the system prompt and return the reply', async () => {
    const client = new FakeClient(async () => '- met the team');
    const summarizer = new BatchSummarizer(client);

    const response = await summarizer.summarizeBatch(batchOf([standup]), { hashtag: 'work' });

    expect(response.content).toBe('- met the team');
    expect(response.model).toBe('fake-model');
    expect(response.error).toBeUndefined();
    expect(client.calls).toHaveLength(1);
    expect(client.calls[0].options).toEqual({ system: SYSTEM_PROMPT });
    expect(client.calls[0].prompt).toContain('**Batch**: Single batch');
  });

  it('should label the batch with the requested range when given', async () => {
    const client = new FakeClient(async () => 'ok');
    await new BatchSummarizer(client).summarizeBatch(batchOf([standup], 1, 2), {
      hashtag: 'work',
      dateRange: { start: day('2024-01-15'), end: day('2024-01-21') },
    });

    expect(client.calls[0].prompt).toContain('**Date Range**: 2024-01-15 to 2024-01-21\n**Batch**: Batch 1 of 2');
  });

  it('should report a failed request instead of throwing', async () => {
    const client = new FakeClient(async () => {
      throw new Error('model not loaded');
    });

    const response = await new BatchSummarizer(client).summarizeBatch(batchOf([standup]), { hashtag: 'work' });

    expect(response.content).toBe('');
    expect(response.error).toBe('model not loaded');
  });

  it('should expose the client model', () => {
    expect(new BatchSummarizer(new FakeClient(async () => '')).model).toBe('fake-model');
  });
});
