/**
 * Search Summaries Handler - keyword search with best-matching excerpts
 */

import path from 'path';

import { searchDocuments } from '../../core/retriever.js';
import { loadSummaryDocuments } from '../../core/summaries.js';
import { formatIsoDate } from '../../core/temporal.js';
import type { SearchSummariesArgs } from '../tools.js';
import { summariesDirFor, type ToolContext } from './context.js';

export async function handleSearchSummaries(
  context: ToolContext,
  args: SearchSummariesArgs
): Promise<unknown> {
  const dir = summariesDirFor(context, args.summaries_dir);
  const documents = await loadSummaryDocuments(dir, context.logger);
  const results = searchDocuments(documents, args.query, { limit: args.limit });

  return {
    query: args.query,
    searched: documents.length,
    results: results.map((result) => ({
      file: path.basename(result.document.filename),
      date: result.date ? formatIsoDate(result.date) : null,
      hashtag: result.hashtag,
      score: result.score,
      excerpt: result.excerpt,
    })),
  };
}
