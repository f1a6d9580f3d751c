/**
 * Scan Command
 *
 * Lists the notes a summarize run would read, optionally counting the ones
 * that carry a hashtag.
 */

import type { Command } from 'commander';
import path from 'path';

import { createLogger } from '../../core/logger.js';
import { formatIsoDate } from '../../core/temporal.js';
import { EntryParser, groupEntriesByDate, UNKNOWN_DATE_KEY } from '../../ingest/parser.js';
import { scanVault, validateVault } from '../../ingest/scanner.js';
import { c } from '../colors.js';
import { exitWithError } from '../helpers.js';

export function registerScanCommand(program: Command): void {
  program
    .command('scan')
    .description('Scan a vault for markdown notes')
    .argument('<vault>', 'Path to the vault')
    .option('-t, --tag <hashtag>', 'Also count notes tagged with this hashtag')
    .option('-v, --verbose', 'List every file found')
    .action(async (vault: string, options: { tag?: string; verbose?: boolean }) => {
      const logger = createLogger(Boolean(options.verbose));

      try {
        const result = await scanVault(vault, { logger });
        const valid = await validateVault(vault, logger);

        console.log(`\n${c.title('Vault')} ${c.path(result.vaultPath)}${valid ? '' : c.warning(' (not a vault?)')}`);
        console.log(`  Markdown files: ${result.markdownFiles.length} of ${result.totalFiles}`);
        console.log(`  Excluded dirs:  ${c.dim(result.excludedDirs.join(', '))}`);
        console.log(`  Scan time:      ${result.scanTimeMs}ms`);

        if (options.verbose) {
          console.log('');
          for (const file of result.markdownFiles) {
            console.log(`  ${c.file(path.relative(result.vaultPath, file))}`);
          }
        }

        if (!options.tag) return;

        const parser = new EntryParser({ targetHashtag: options.tag, logger });
        const entries = await parser.parseFiles(result.markdownFiles);
        console.log(`\n${c.hashtag(parser.targetHashtag)}: ${entries.length} notes`);

        const grouped = groupEntriesByDate(entries);
        const keys = [...grouped.keys()].sort();
        for (const key of keys) {
          const group = grouped.get(key) ?? [];
          const label = key === UNKNOWN_DATE_KEY ? c.dim('undated') : key;
          console.log(c.list(`${label}: ${group.map((e) => e.title).join(', ')}`));
        }

        const dated = entries.flatMap((e) => (e.date ? [e.date] : []));
        if (dated.length > 0) {
          const times = dated.map((d) => d.getTime());
          console.log(c.dim(`\nDates span ${formatIsoDate(new Date(Math.min(...times)))} to ${formatIsoDate(new Date(Math.max(...times)))}`));
        }
      } catch (error) {
        exitWithError(error);
      }
    });
}
