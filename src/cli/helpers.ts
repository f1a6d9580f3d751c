/**
 * CLI Helper Functions
 *
 * Shared utilities for CLI commands.
 */

import { InvalidArgumentError } from 'commander';
import path from 'path';

import { errorMessage } from '../core/errors.js';
import { c } from './colors.js';

/** commander argument parser for options that take a positive integer. */
export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}

/** Print `Error: <message>` and exit 1. */
export function exitWithError(error: unknown): never {
  console.error(c.error(`Error: ${errorMessage(error)}`));
  process.exit(1);
}

/**
 * Where summaries live: an explicit directory wins, then the configured one,
 * then `<vault>/Summaries`, then `./Summaries`.
 */
export function resolveSummariesDir(options: {
  explicit?: string;
  configured?: string;
  vaultPath?: string;
}): string {
  if (options.explicit) return path.resolve(options.explicit);
  if (options.configured) return path.resolve(options.configured);
  if (options.vaultPath) return path.resolve(options.vaultPath, 'Summaries');
  return path.resolve('Summaries');
}

export function truncate(text: string, max: number): string {
  const oneLine = text.replace(/\s+/g, ' ').trim();
  return oneLine.length > max ? `${oneLine.slice(0, max - 3)}...` : oneLine;
}
