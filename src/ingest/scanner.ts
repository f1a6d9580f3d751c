/**
 * tagdigest - Vault Scanner
 *
 * Finds the markdown notes of a vault, leaving out tool and output
 * directories and editor scratch files.
 */

import { readdir, stat } from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';

import { VaultError, errorMessage } from '../core/errors.js';
import { NullLogger, type Logger } from '../core/logger.js';

// ============================================================================
// Types
// ============================================================================

export interface ScanResult {
  vaultPath: string;
  markdownFiles: string[];     // absolute paths, sorted
  totalFiles: number;          // markdown files seen, before exclusions
  excludedDirs: string[];
  scanTimeMs: number;
}

export interface ScanOptions {
  recursive?: boolean;
  excludeDirs?: readonly string[];   // added to the defaults
  logger?: Logger;
}

export const DEFAULT_EXCLUDE_DIRS: readonly string[] = [
  '.obsidian',
  '.git',
  'node_modules',
  '.vscode',
  '.idea',
  '.venv',
  '__pycache__',
  'Summaries',
  'Attachments',
  'Templates',
];

const EXCLUDED_PREFIXES = ['~', '.#'];
const EXCLUDED_SUFFIXES = ['.tmp', '.bak', '.swp', '.swo'];

// ============================================================================
// Scanning
// ============================================================================

export function isExcludedFilename(name: string): boolean {
  return (
    EXCLUDED_PREFIXES.some((p) => name.startsWith(p)) ||
    EXCLUDED_SUFFIXES.some((s) => name.endsWith(s))
  );
}

async function assertDirectory(vaultPath: string): Promise<void> {
  if (!existsSync(vaultPath)) {
    throw new VaultError(`Vault path does not exist: ${vaultPath}`, vaultPath);
  }
  const stats = await stat(vaultPath);
  if (!stats.isDirectory()) {
    throw new VaultError(`Vault path is not a directory: ${vaultPath}`, vaultPath);
  }
}

async function collectMarkdown(dir: string, recursive: boolean, results: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (recursive) {
        await collectMarkdown(fullPath, recursive, results);
      }
    } else if (entry.isFile() && entry.name.endsWith('.md')) {
      results.push(fullPath);
    }
  }
}

export async function scanVault(vaultPath: string, options: ScanOptions = {}): Promise<ScanResult> {
  const { recursive = true, logger = new NullLogger() } = options;
  const root = path.resolve(vaultPath);
  await assertDirectory(root);

  const excluded = new Set([...DEFAULT_EXCLUDE_DIRS, ...(options.excludeDirs ?? [])]);
  const started = Date.now();

  const found: string[] = [];
  try {
    await collectMarkdown(root, recursive, found);
  } catch (error) {
    throw new VaultError(`Failed to scan ${root}: ${errorMessage(error)}`, root, error);
  }

  const markdownFiles = found.filter((filePath) => {
    const segments = path.relative(root, filePath).split(path.sep);
    if (segments.slice(0, -1).some((s) => excluded.has(s))) {
      logger.debug(`Excluding file: ${filePath}`);
      return false;
    }
    if (isExcludedFilename(path.basename(filePath))) {
      logger.debug(`Excluding file (pattern match): ${filePath}`);
      return false;
    }
    return true;
  });
  markdownFiles.sort();

  const scanTimeMs = Date.now() - started;
  logger.info(`Scan completed: ${markdownFiles.length} markdown files found out of ${found.length} in ${scanTimeMs}ms`);

  return {
    vaultPath: root,
    markdownFiles,
    totalFiles: found.length,
    excludedDirs: [...excluded].sort(),
    scanTimeMs,
  };
}

/**
 * A vault is usable when it has a `.obsidian` settings directory and at
 * least one note.
 */
export async function validateVault(vaultPath: string, logger: Logger = new NullLogger()): Promise<boolean> {
  const root = path.resolve(vaultPath);
  if (!existsSync(path.join(root, '.obsidian'))) {
    logger.warn(`No .obsidian directory found in ${root}; this might not be a vault`);
    return false;
  }

  const result = await scanVault(root, { logger });
  if (result.markdownFiles.length === 0) {
    logger.warn(`No markdown files found in ${root}`);
    return false;
  }

  logger.debug(`Vault validation passed: ${result.markdownFiles.length} markdown files found`);
  return true;
}
