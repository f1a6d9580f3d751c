/**
 * Shared state handed to every MCP tool handler.
 */

import path from 'path';

import type { DigestConfig } from '../../core/config.js';
import type { Logger } from '../../core/logger.js';

export interface ToolContext {
  config: DigestConfig;
  /** Default summaries directory when a call does not name one. */
  summariesDir: string;
  logger: Logger;
  now: () => Date;
}

export function summariesDirFor(context: ToolContext, requested?: string): string {
  return requested ? path.resolve(requested) : context.summariesDir;
}
