/**
 * Summary store: the summaries directory as SummaryDocuments.
 */

import { readdir, readFile } from 'fs/promises';
import { existsSync, statSync } from 'fs';
import path from 'path';

import { VaultError, errorMessage } from './errors.js';
import { NullLogger, type Logger } from './logger.js';
import type { SummaryDocument } from './types.js';

/**
 * Read every `*.md` file directly inside `dir`, in name order. Files that
 * cannot be read are logged and skipped.
 */
export async function loadSummaryDocuments(
  dir: string,
  logger: Logger = new NullLogger()
): Promise<SummaryDocument[]> {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    throw new VaultError(`Summaries directory does not exist: ${dir}`, dir);
  }

  const names = (await readdir(dir, { withFileTypes: true }))
    .filter((e) => e.isFile() && e.name.endsWith('.md'))
    .map((e) => e.name)
    .sort();

  const documents: SummaryDocument[] = [];
  for (const name of names) {
    const filePath = path.join(dir, name);
    try {
      documents.push({ filename: filePath, content: await readFile(filePath, 'utf-8') });
    } catch (error) {
      logger.warn(`Failed to read ${filePath}: ${errorMessage(error)}`);
    }
  }

  logger.debug(`Loaded ${documents.length} summaries from ${dir}`);
  return documents;
}
