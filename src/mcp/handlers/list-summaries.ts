/**
 * List Summaries Handler - summary files with their header metadata
 */

import path from 'path';

import { SummaryWriter } from '../../core/writer.js';
import type { ListSummariesArgs } from '../tools.js';
import { summariesDirFor, type ToolContext } from './context.js';

export async function handleListSummaries(
  context: ToolContext,
  args: ListSummariesArgs
): Promise<unknown> {
  const dir = summariesDirFor(context, args.summaries_dir);
  const writer = new SummaryWriter(dir, { logger: context.logger });
  const wanted = args.hashtag?.replace(/^#/, '').toLowerCase();

  const summaries = [];
  for (const file of await writer.listSummaries()) {
    const info = await writer.getSummaryInfo(file);
    if ('error' in info) {
      if (!wanted) summaries.push({ file: path.basename(file), error: info.error });
      continue;
    }

    const hashtag = info.frontmatter?.hashtag ?? null;
    if (wanted && hashtag?.toLowerCase() !== wanted) continue;

    summaries.push({
      file: path.basename(file),
      title: info.frontmatter?.title ?? null,
      date: info.frontmatter?.date ?? null,
      hashtag,
      size: info.size,
      modified: info.modified.toISOString(),
    });
  }

  return {
    summaries_dir: dir,
    total: summaries.length,
    summaries,
  };
}
