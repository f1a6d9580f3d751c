/**
 * Search Command
 *
 * Keyword search over generated summaries.
 */

import type { Command } from 'commander';
import path from 'path';

import { loadConfig } from '../../core/config.js';
import { createLogger } from '../../core/logger.js';
import { searchDocuments } from '../../core/retriever.js';
import { loadSummaryDocuments } from '../../core/summaries.js';
import { formatDate, formatIsoDate } from '../../core/temporal.js';
import { c, RULE } from '../colors.js';
import { exitWithError, parsePositiveInt, resolveSummariesDir } from '../helpers.js';

interface SearchCommandOptions {
  summaries?: string;
  limit: number;
  json?: boolean;
  verbose?: boolean;
}

export function registerSearchCommand(program: Command): void {
  program
    .command('search')
    .description('Search generated summaries')
    .argument('<query>', 'Search query')
    .option('-s, --summaries <dir>', 'Summaries directory (default: configured dir or ./Summaries)')
    .option('-l, --limit <limit>', 'Max results', parsePositiveInt, 5)
    .option('--json', 'Print results as JSON')
    .option('-v, --verbose', 'Debug logging')
    .action(async (query: string, options: SearchCommandOptions) => {
      const logger = createLogger(Boolean(options.verbose));

      try {
        const config = await loadConfig();
        const dir = resolveSummariesDir({ explicit: options.summaries, configured: config.summariesDir });
        const documents = await loadSummaryDocuments(dir, logger);
        const results = searchDocuments(documents, query, { limit: options.limit });

        if (options.json) {
          const payload = results.map((r) => ({
            file: path.basename(r.document.filename),
            date: r.date ? formatIsoDate(r.date) : null,
            hashtag: r.hashtag,
            score: r.score,
            excerpt: r.excerpt,
          }));
          console.log(JSON.stringify(payload, null, 2));
          return;
        }

        console.log(`\nSearching for: "${query}" in ${c.path(dir)}\n`);

        if (results.length === 0) {
          console.log('No results found.');
          return;
        }

        for (const result of results) {
          console.log(RULE);
          console.log(`📄 ${c.file(path.basename(result.document.filename))}`);
          console.log(`   Date: ${result.date ? formatDate(result.date) : 'unknown'} | Tag: ${c.hashtag(result.hashtag)}`);
          console.log(`   Score: ${(result.score * 100).toFixed(1)}%`);
          if (result.excerpt) {
            console.log(`\n   ${result.excerpt.replace(/\n/g, '\n   ')}`);
          }
          console.log('');
        }
      } catch (error) {
        exitWithError(error);
      }
    });
}
