/**
 * tagdigest - MCP Server
 *
 * Exposes summary search and vault planning tools over Model Context
 * Protocol (stdio). Started by `tagdigest mcp`.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import path from 'path';

import { loadConfig } from '../core/config.js';
import { errorMessage } from '../core/errors.js';
import { ConsoleLogger, type Logger } from '../core/logger.js';
import {
  ListSummariesSchema,
  PlanBatchesSchema,
  ScanVaultSchema,
  SearchSummariesSchema,
  toolDefinitions,
} from './tools.js';
import type { ToolContext } from './handlers/context.js';
import { handleListSummaries } from './handlers/list-summaries.js';
import { handlePlanBatches } from './handlers/plan-batches.js';
import { handleScanVault } from './handlers/scan-vault.js';
import { handleSearchSummaries } from './handlers/search-summaries.js';

type ToolHandler = (context: ToolContext, args: unknown) => Promise<unknown>;

type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

const handlers: Record<string, ToolHandler> = {
  search_summaries: (context, args) => handleSearchSummaries(context, SearchSummariesSchema.parse(args ?? {})),
  list_summaries: (context, args) => handleListSummaries(context, ListSummariesSchema.parse(args ?? {})),
  scan_vault: (context, args) => handleScanVault(context, ScanVaultSchema.parse(args ?? {})),
  plan_batches: (context, args) => handlePlanBatches(context, PlanBatchesSchema.parse(args ?? {})),
};

/**
 * Run one tool call. Failures, including argument validation, come back as
 * an `{ error }` payload with `isError` set.
 */
export async function callTool(context: ToolContext, name: string, args: unknown): Promise<ToolResult> {
  try {
    const handler = handlers[name];
    if (!handler) {
      throw new Error(`Unknown tool: ${name}`);
    }
    const result = await handler(context, args);

    return {
      content: [
        {
          type: 'text',
          text: JSON.stringify(result, null, 2),
        },
      ],
    };
  } catch (error) {
    context.logger.error(`Tool ${name} failed: ${errorMessage(error)}`);
    return {
      content: [
        {
          type: 'text',
          text: JSON.stringify({ error: errorMessage(error) }),
        },
      ],
      isError: true,
    };
  }
}

export function createServer(context: ToolContext): Server {
  const server = new Server(
    {
      name: 'tagdigest',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: toolDefinitions };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return callTool(context, name, args);
  });

  return server;
}

export async function startServer(options: { summariesDir?: string; logger?: Logger } = {}): Promise<void> {
  // stdout carries the protocol; logs go to stderr
  const logger = options.logger ?? new ConsoleLogger({ level: 'warn' });
  const config = await loadConfig();
  const summariesDir = path.resolve(options.summariesDir ?? config.summariesDir ?? 'Summaries');

  const server = createServer({
    config,
    summariesDir,
    logger,
    now: () => new Date(),
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`MCP server ready (summaries: ${summariesDir})`);
}
