/**
 * Scan Vault Handler - markdown notes in a vault, optionally counted by hashtag
 */

import path from 'path';

import { EntryParser, groupEntriesByDate } from '../../ingest/parser.js';
import { scanVault } from '../../ingest/scanner.js';
import type { ScanVaultArgs } from '../tools.js';
import type { ToolContext } from './context.js';

const MAX_LISTED_FILES = 200;

export async function handleScanVault(
  context: ToolContext,
  args: ScanVaultArgs
): Promise<unknown> {
  const scan = await scanVault(args.vault_path, { logger: context.logger });
  const files = scan.markdownFiles.map((f) => path.relative(scan.vaultPath, f));

  const result = {
    vault_path: scan.vaultPath,
    markdown_files: scan.markdownFiles.length,
    total_files: scan.totalFiles,
    excluded_dirs: scan.excludedDirs,
    scan_time_ms: scan.scanTimeMs,
    files: files.slice(0, MAX_LISTED_FILES),
    truncated: files.length > MAX_LISTED_FILES,
  };

  if (!args.hashtag) return result;

  const parser = new EntryParser({ targetHashtag: args.hashtag, logger: context.logger });
  const entries = await parser.parseFiles(scan.markdownFiles);
  const byDate: Record<string, number> = {};
  for (const [key, group] of groupEntriesByDate(entries)) {
    byDate[key] = group.length;
  }

  return {
    ...result,
    hashtag: {
      tag: parser.targetHashtag,
      matching: entries.length,
      by_date: byDate,
    },
  };
}
