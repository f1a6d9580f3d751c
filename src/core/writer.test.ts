import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { parseFrontmatter } from './frontmatter.js';
import {
  NO_CONTENT_MESSAGE,
  SummaryWriter,
  mergeBatchSummaries,
  summaryFilename,
  summaryTitle,
  type SummaryWriteRequest,
} from './writer.js';

const day = (iso: string): Date => new Date(`${iso}T00:00:00.000Z`);

const request: SummaryWriteRequest = {
  hashtag: '#work',
  startDate: day('2024-01-15'),
  endDate: day('2024-01-21'),
  model: 'llama3.1:8b',
  entriesProcessed: 3,
  batchCount: 2,
};

describe('mergeBatchSummaries', () => {
  it('should return a placeholder for no summaries', () => {
    expect(mergeBatchSummaries([])).toBe(NO_CONTENT_MESSAGE);
  });

  it('should return a single summary unchanged', () => {
    expect(mergeBatchSummaries(['  only one  '])).toBe('  only one  ');
  });

  it('should number sections and skip blank ones', () => {
    expect(mergeBatchSummaries(['first', '  ', 'third '])).toBe('### Batch 1\nfirst\n\n### Batch 3\nthird\n');
  });
});

describe('summary naming', () => {
  it('should name the file after the week start and hashtag', () => {
    expect(summaryFilename('#work', day('2024-01-15'))).toBe('Week-2024-01-15-work.md');
    expect(summaryTitle('work', day('2024-01-15'), day('2024-01-21'))).toBe(
      'Week Summary - #work (2024-01-15 to 2024-01-21)'
    );
  });
});

describe('SummaryWriter', () => {
  let dir: string;
  const now = () => new Date('2024-01-22T09:30:00.000Z');

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'tagdigest-writer-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write a header the retriever can read back', async () => {
    const outputDir = path.join(dir, 'Summaries');
    const writer = new SummaryWriter(outputDir, { now });

    const filePath = await writer.writeSummary(['first', 'second'], request);

    expect(filePath).toBe(path.join(outputDir, 'Week-2024-01-15-work.md'));
    const { frontmatter, body } = parseFrontmatter(await readFile(filePath, 'utf-8'));
    expect(frontmatter).toEqual({
      title: 'Week Summary - #work (2024-01-15 to 2024-01-21)',
      date: '2024-01-22',
      hashtag: 'work',
      tags: [],
    });
    expect(body).toBe(
      '\n# Week Summary - #work (2024-01-15 to 2024-01-21)\n\n' +
        '### Batch 1\nfirst\n\n### Batch 2\nsecond\n\n\n' +
        '## Summary Statistics\n' +
        '- **Total Entries**: 3\n' +
        '- **Batches Processed**: 2\n' +
        '- **Model Used**: llama3.1:8b\n' +
        '- **Generation Time**: 2024-01-22 09:30:00\n'
    );
  });

  it('should add the token total when known', () => {
    const text = new SummaryWriter(dir, { now }).renderSummary(['only'], { ...request, totalTokens: 1234 });

    expect(text).toContain('total_tokens: 1234\n');
    expect(text.endsWith('- **Generation Time**: 2024-01-22 09:30:00\n- **Total Tokens**: 1234\n')).toBe(true);
  });

  it('should list written summaries by name', async () => {
    const writer = new SummaryWriter(dir, { now });
    await writer.writeSummary(['b'], { ...request, hashtag: 'personal' });
    await writer.writeSummary(['a'], request);

    expect(await writer.listSummaries()).toEqual([
      path.join(dir, 'Week-2024-01-15-personal.md'),
      path.join(dir, 'Week-2024-01-15-work.md'),
    ]);
  });

  it('should return no summaries for a missing directory', async () => {
    expect(await new SummaryWriter(path.join(dir, 'missing')).listSummaries()).toEqual([]);
  });

  it('should describe a summary file or the error reading it', async () => {
    const writer = new SummaryWriter(dir, { now });
    const filePath = await writer.writeSummary(['a'], request);

    const info = await writer.getSummaryInfo(filePath);
    expect('frontmatter' in info && info.frontmatter?.hashtag).toBe('work');

    const missing = await writer.getSummaryInfo(path.join(dir, 'nope.md'));
    expect('error' in missing).toBe(true);
    expect(missing.path).toBe(path.join(dir, 'nope.md'));
  });
});
