/**
 * tagdigest - MCP Tool Definitions
 *
 * Two categories:
 * 1. Summary tools - read the generated summaries (search, list)
 * 2. Vault tools - inspect a vault without calling a model (scan, plan)
 */

import { z } from 'zod';

interface InputSchema {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
}

// Tool arguments are always a zod object at the top level
function toInputSchema(schema: z.AnyZodObject): InputSchema {
  const properties: Record<string, unknown> = {};
  const required: string[] = [];

  for (const [key, value] of Object.entries<z.ZodTypeAny>(schema.shape)) {
    properties[key] = zodToJsonSchema(value);

    if (!(value instanceof z.ZodOptional) && !(value instanceof z.ZodDefault)) {
      required.push(key);
    }
  }

  return required.length > 0 ? { type: 'object', properties, required } : { type: 'object', properties };
}

// Simplified Zod to JSON Schema conversion for the types the tools use
function zodToJsonSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  if (schema instanceof z.ZodObject) {
    return { ...toInputSchema(schema), description: schema.description };
  }

  if (schema instanceof z.ZodString) {
    return { type: 'string', description: schema.description };
  }

  if (schema instanceof z.ZodNumber) {
    return { type: schema.isInt ? 'integer' : 'number', description: schema.description };
  }

  if (schema instanceof z.ZodBoolean) {
    return { type: 'boolean', description: schema.description };
  }

  if (schema instanceof z.ZodOptional) {
    return { ...zodToJsonSchema(schema.unwrap()), description: schema.description };
  }

  if (schema instanceof z.ZodDefault) {
    return {
      ...zodToJsonSchema(schema.removeDefault()),
      default: schema._def.defaultValue(),
      description: schema.description,
    };
  }

  if (schema instanceof z.ZodArray) {
    return { type: 'array', items: zodToJsonSchema(schema.element), description: schema.description };
  }

  return { type: 'string' };
}

// ============================================================================
// Summary Tools
// ============================================================================

export const SearchSummariesSchema = z.object({
  query: z.string().min(1).describe('Keywords to look for in the summaries'),
  limit: z.number().int().min(1).max(50).default(5).describe('Max results'),
  summaries_dir: z.string().optional().describe('Summaries directory (defaults to the configured one)'),
});

export const ListSummariesSchema = z.object({
  hashtag: z.string().optional().describe('Only summaries written for this hashtag'),
  summaries_dir: z.string().optional().describe('Summaries directory (defaults to the configured one)'),
});

// ============================================================================
// Vault Tools
// ============================================================================

export const ScanVaultSchema = z.object({
  vault_path: z.string().min(1).describe('Absolute path to the vault'),
  hashtag: z.string().optional().describe('Also count notes carrying this hashtag'),
});

export const PlanBatchesSchema = z.object({
  vault_path: z.string().min(1).describe('Absolute path to the vault'),
  hashtag: z.string().min(1).describe('Hashtag to summarize, with or without #'),
  start: z.string().optional().describe('Start date: YYYY-MM-DD, 7d, 2w, 1m, "last week"'),
  end: z.string().optional().describe('End date, inclusive'),
  max_batch_size: z.number().int().min(1).optional().describe('Max entries per batch'),
  max_tokens_per_batch: z.number().int().min(1).optional().describe('Max estimated tokens per batch'),
  days_per_batch: z.number().int().min(1).optional().describe('Batch by date windows of this many days'),
});

export type SearchSummariesArgs = z.infer<typeof SearchSummariesSchema>;
export type ListSummariesArgs = z.infer<typeof ListSummariesSchema>;
export type ScanVaultArgs = z.infer<typeof ScanVaultSchema>;
export type PlanBatchesArgs = z.infer<typeof PlanBatchesSchema>;

// ============================================================================
// Tool Definitions
// ============================================================================

export const toolDefinitions = [
  {
    name: 'search_summaries',
    description: `Keyword search over the weekly hashtag summaries. Returns the best-matching paragraph of each summary with its date, hashtag and a 0-1 score.

USE THIS WHEN:
- The user asks what happened with a topic, project or tag in past weeks
- You need context from earlier summaries before answering`,
    inputSchema: toInputSchema(SearchSummariesSchema),
  },
  {
    name: 'list_summaries',
    description: 'List the summary files on disk with their title, date and hashtag.',
    inputSchema: toInputSchema(ListSummariesSchema),
  },
  {
    name: 'scan_vault',
    description: `Scan a vault for markdown notes, skipping tool, template and output directories. With a hashtag, also reports how many notes carry it and on which dates.`,
    inputSchema: toInputSchema(ScanVaultSchema),
  },
  {
    name: 'plan_batches',
    description: `Show how the notes for a hashtag and date range would be split into summarization batches. No model is called.

USE THIS WHEN:
- Checking what a summarize run would cover before starting it
- Tuning batch size or token limits`,
    inputSchema: toInputSchema(PlanBatchesSchema),
  },
];
