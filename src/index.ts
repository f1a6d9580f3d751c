#!/usr/bin/env node

/**
 * tagdigest CLI
 *
 * Commands:
 * - summarize: Summarize notes tagged with a hashtag over a week
 * - scan: List the notes of a vault
 * - search: Keyword search over generated summaries
 * - chat: Ask questions about the summaries
 * - config: Show or change settings
 * - mcp: Start the MCP server
 */

// Load environment variables from .env files
// .env.local takes precedence over .env
import { existsSync, readFileSync } from 'fs';
import { parse } from 'dotenv';

function loadEnvFile(filePath: string, override = false): void {
  if (!existsSync(filePath)) return;
  try {
    const parsed = parse(readFileSync(filePath, 'utf-8'));
    for (const [key, value] of Object.entries(parsed)) {
      if (override || process.env[key] === undefined) {
        process.env[key] = value;
      }
    }
  } catch (error) {
    console.error(`[tagdigest] Could not read ${filePath}: ${error instanceof Error ? error.message : error}`);
  }
}

loadEnvFile('.env');
loadEnvFile('.env.local', true);

import { Command } from 'commander';

import { registerChatCommand } from './cli/commands/chat.js';
import { registerConfigCommand } from './cli/commands/config.js';
import { registerScanCommand } from './cli/commands/scan.js';
import { registerSearchCommand } from './cli/commands/search.js';
import { registerSummarizeCommand } from './cli/commands/summarize.js';
import { exitWithError } from './cli/helpers.js';

const program = new Command();

program
  .name('tagdigest')
  .description('Summarize hashtag-tagged notes in token-budgeted batches and search the summaries')
  .version('0.1.0');

registerSummarizeCommand(program);
registerScanCommand(program);
registerSearchCommand(program);
registerChatCommand(program);
registerConfigCommand(program);

program
  .command('mcp')
  .description('Start the MCP server (stdio)')
  .option('-s, --summaries <dir>', 'Summaries directory the tools search by default')
  .action(async (options: { summaries?: string }) => {
    const { startServer } = await import('./mcp/server.js');
    try {
      await startServer({ summariesDir: options.summaries });
    } catch (error) {
      exitWithError(error);
    }
  });

await program.parseAsync();
