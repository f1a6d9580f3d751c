/**
 * tagdigest - Centralized Config Loader
 *
 * Loads configuration from ~/.config/tagdigest/config.json with env var overrides.
 * Resolution order: CLI overrides > process.env > config.json > defaults
 *
 * API keys are env-only and never stored in config.
 */

import { readFile, writeFile, mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import os from 'os';
import { z } from 'zod';

import { DEFAULT_MAX_BATCH_SIZE, DEFAULT_MAX_TOKENS_PER_BATCH } from './batcher.js';
import { ConfigError, errorMessage } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_MODEL = 'llama3.1:8b';
export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;
export const DEFAULT_MAX_RETRIES = 3;

const ConfigFileSchema = z.object({
  version: z.number().int().default(1),
  model: z.string().optional(),
  ollama_host: z.string().optional(),
  max_batch_size: z.number().optional(),
  max_tokens_per_batch: z.number().optional(),
  summaries_dir: z.string().optional(),
  request_timeout_ms: z.number().optional(),
  max_retries: z.number().optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

const ResolvedConfigSchema = z.object({
  model: z.string().min(1),
  ollamaHost: z.string().url(),
  openaiApiKey: z.string().min(1).optional(),
  anthropicApiKey: z.string().min(1).optional(),
  maxBatchSize: z.coerce.number().int().min(1),
  maxTokensPerBatch: z.coerce.number().int().min(1),
  summariesDir: z.string().min(1).optional(),
  requestTimeoutMs: z.coerce.number().int().positive(),
  maxRetries: z.coerce.number().int().min(0),
});

export type DigestConfig = z.infer<typeof ResolvedConfigSchema>;

export type ConfigOverrides = Partial<{ [K in keyof DigestConfig]: DigestConfig[K] | string }>;

const NUMERIC_KEYS = ['max_batch_size', 'max_tokens_per_batch', 'request_timeout_ms', 'max_retries'] as const;
const TEXT_KEYS = ['model', 'ollama_host', 'summaries_dir'] as const;

type NumericKey = (typeof NUMERIC_KEYS)[number];
type TextKey = (typeof TEXT_KEYS)[number];

/** Keys `tagdigest config set` may write. */
export const SETTABLE_KEYS: readonly string[] = [...TEXT_KEYS, ...NUMERIC_KEYS];

// ============================================================================
// Paths
// ============================================================================

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.TAGDIGEST_CONFIG || path.join(os.homedir(), '.config', 'tagdigest', 'config.json');
}

// ============================================================================
// Config Loading
// ============================================================================

/**
 * Load config from disk. Returns null if the config file doesn't exist.
 */
export async function loadConfigFile(configPath: string): Promise<ConfigFile | null> {
  if (!existsSync(configPath)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Could not read config file ${configPath}: ${errorMessage(error)}`, [], error);
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${configPath}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

function firstSet<T>(...values: Array<T | undefined>): T | undefined {
  return values.find((v) => v !== undefined && v !== '');
}

/**
 * Load resolved config. Throws ConfigError when a value is out of range,
 * e.g. a batch size below 1.
 */
export async function loadConfig(
  options: { env?: NodeJS.ProcessEnv; configPath?: string; overrides?: ConfigOverrides } = {}
): Promise<DigestConfig> {
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};
  const file = await loadConfigFile(options.configPath ?? getConfigPath(env));

  const merged = {
    model: firstSet(overrides.model, env.TAGDIGEST_MODEL, file?.model, DEFAULT_MODEL),
    ollamaHost: firstSet(overrides.ollamaHost, env.OLLAMA_HOST, file?.ollama_host, DEFAULT_OLLAMA_HOST),
    openaiApiKey: firstSet(overrides.openaiApiKey, env.OPENAI_API_KEY),
    anthropicApiKey: firstSet(overrides.anthropicApiKey, env.ANTHROPIC_API_KEY),
    maxBatchSize: firstSet<string | number>(
      overrides.maxBatchSize, env.TAGDIGEST_MAX_BATCH_SIZE, file?.max_batch_size, DEFAULT_MAX_BATCH_SIZE
    ),
    maxTokensPerBatch: firstSet<string | number>(
      overrides.maxTokensPerBatch, env.TAGDIGEST_MAX_TOKENS, file?.max_tokens_per_batch, DEFAULT_MAX_TOKENS_PER_BATCH
    ),
    summariesDir: firstSet(overrides.summariesDir, env.TAGDIGEST_SUMMARIES_DIR, file?.summaries_dir),
    requestTimeoutMs: firstSet<string | number>(
      overrides.requestTimeoutMs, env.TAGDIGEST_TIMEOUT_MS, file?.request_timeout_ms, DEFAULT_REQUEST_TIMEOUT_MS
    ),
    maxRetries: firstSet<string | number>(overrides.maxRetries, file?.max_retries, DEFAULT_MAX_RETRIES),
  };

  const resolved = ResolvedConfigSchema.safeParse(merged);
  if (!resolved.success) {
    throw new ConfigError('Invalid configuration', formatIssues(resolved.error));
  }
  return resolved.data;
}

/**
 * Save config to disk. Only non-sensitive keys are accepted.
 */
export async function saveConfig(
  config: Partial<Omit<ConfigFile, 'version'>>,
  configPath: string = getConfigPath()
): Promise<void> {
  await mkdir(path.dirname(configPath), { recursive: true });

  // Merge with existing config
  const existing = await loadConfigFile(configPath);
  const merged: ConfigFile = {
    ...existing,
    ...config,
    version: 1,
  };

  await writeFile(configPath, JSON.stringify(merged, null, 2) + '\n');
}

/**
 * Set a single key from its string form (as typed on the command line).
 */
export async function setConfigValue(
  key: string,
  value: string,
  configPath: string = getConfigPath()
): Promise<void> {
  if (isNumericKey(key)) {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 0) {
      throw new ConfigError(`Config key "${key}" needs a non-negative integer, got "${value}"`);
    }
    const update: Partial<Record<NumericKey, number>> = {};
    update[key] = n;
    await saveConfig(update, configPath);
    return;
  }

  if (isTextKey(key)) {
    const update: Partial<Record<TextKey, string>> = {};
    update[key] = value;
    await saveConfig(update, configPath);
    return;
  }

  throw new ConfigError(`Unknown config key "${key}". Valid keys: ${SETTABLE_KEYS.join(', ')}`);
}

function isNumericKey(key: string): key is NumericKey {
  return NUMERIC_KEYS.some((k) => k === key);
}

function isTextKey(key: string): key is TextKey {
  return TEXT_KEYS.some((k) => k === key);
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
