/**
 * tagdigest - Generation Clients
 *
 * One interface over the three places a summary can come from:
 * - claude-*            -> Anthropic API
 * - gpt-*, o1*, o3*     -> OpenAI API
 * - anything else       -> local Ollama server (OpenAI-compatible /v1 endpoint)
 */

import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';

import type { DigestConfig } from './config.js';
import { ConfigError, GenerationError, errorMessage } from './errors.js';
import { NullLogger, type Logger } from './logger.js';

export type Provider = 'anthropic' | 'openai' | 'ollama';

export interface GenerateOptions {
  system?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface ConnectionStatus {
  ok: boolean;
  message: string;
  availableModels?: string[];
}

export interface GenerationClient {
  readonly provider: Provider;
  readonly model: string;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
  checkConnection(): Promise<ConnectionStatus>;
}

const DEFAULT_TEMPERATURE = 0.3;
const DEFAULT_MAX_TOKENS = 2000;

export function detectProvider(model: string): Provider {
  if (model.startsWith('claude-')) return 'anthropic';
  if (model.startsWith('gpt-') || /^o[13]\b/.test(model) || /^o[13]-/.test(model)) return 'openai';
  return 'ollama';
}

// ============================================================================
// Retry
// ============================================================================

export function isRetryableError(error: unknown): boolean {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    if (error.status === 429 || error.status >= 500) return true;
  }
  const message = errorMessage(error).toLowerCase();
  return (
    message.includes('connection') ||
    message.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('econnreset') ||
    message.includes('rate limit')
  );
}

export async function withRetries<T>(
  fn: () => Promise<T>,
  options: {
    maxRetries: number;
    label: string;
    logger?: Logger;
    sleep?: (ms: number) => Promise<void>;
  }
): Promise<T> {
  const { maxRetries, label, logger = new NullLogger() } = options;
  const sleep = options.sleep ?? ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)));
  const attempts = Math.max(1, maxRetries);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt < attempts && isRetryableError(error)) {
        const delay = Math.pow(2, attempt) * 1000;
        logger.warn(`${label} failed (attempt ${attempt}/${attempts}), retrying in ${delay / 1000}s: ${errorMessage(error)}`);
        await sleep(delay);
        continue;
      }
      break;
    }
  }

  throw lastError;
}

// ============================================================================
// OpenAI-compatible (OpenAI + Ollama)
// ============================================================================

class OpenAICompatibleClient implements GenerationClient {
  constructor(
    readonly provider: 'openai' | 'ollama',
    readonly model: string,
    private client: OpenAI,
    private maxRetries: number,
    private logger: Logger
  ) {}

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const { system, temperature = DEFAULT_TEMPERATURE, maxTokens = DEFAULT_MAX_TOKENS } = options;
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (system) {
      messages.push({ role: 'system', content: system });
    }
    messages.push({ role: 'user', content: prompt });

    try {
      return await withRetries(
        async () => {
          const response = await this.client.chat.completions.create({
            model: this.model,
            messages,
            temperature,
            max_tokens: maxTokens,
          });

          const content = response.choices[0]?.message?.content?.trim();
          if (!content) {
            throw new Error(`No content in ${this.provider} response`);
          }
          return content;
        },
        { maxRetries: this.maxRetries, label: `${this.provider} request`, logger: this.logger }
      );
    } catch (error) {
      throw new GenerationError(`${this.provider} generation failed`, this.provider, this.model, error);
    }
  }

  async checkConnection(): Promise<ConnectionStatus> {
    try {
      const availableModels: string[] = [];
      for await (const model of this.client.models.list()) {
        availableModels.push(model.id);
      }

      if (this.provider === 'ollama' && !availableModels.includes(this.model)) {
        return {
          ok: false,
          message: `Model ${this.model} not found. Pull it with: ollama pull ${this.model}`,
          availableModels,
        };
      }

      return { ok: true, message: `Connected to ${this.provider}`, availableModels };
    } catch (error) {
      return { ok: false, message: `Connection test failed: ${errorMessage(error)}` };
    }
  }
}

// ============================================================================
// Anthropic
// ============================================================================

class AnthropicClient implements GenerationClient {
  readonly provider = 'anthropic' as const;

  constructor(
    readonly model: string,
    private client: Anthropic,
    private maxRetries: number,
    private logger: Logger
  ) {}

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const { system, temperature = DEFAULT_TEMPERATURE, maxTokens = DEFAULT_MAX_TOKENS } = options;

    try {
      return await withRetries(
        async () => {
          const response = await this.client.messages.create({
            model: this.model,
            max_tokens: maxTokens,
            ...(system ? { system } : {}),
            messages: [{ role: 'user', content: prompt }],
            temperature,
          });

          const textBlock = response.content.find((b) => b.type === 'text');
          if (!textBlock || textBlock.type !== 'text') {
            throw new Error('No text response from Claude');
          }
          return textBlock.text.trim();
        },
        { maxRetries: this.maxRetries, label: 'anthropic request', logger: this.logger }
      );
    } catch (error) {
      throw new GenerationError('anthropic generation failed', this.provider, this.model, error);
    }
  }

  async checkConnection(): Promise<ConnectionStatus> {
    // Key presence only; auth errors surface on the first request
    return { ok: true, message: 'Anthropic API key configured' };
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createGenerationClient(
  config: Pick<DigestConfig, 'model' | 'ollamaHost' | 'openaiApiKey' | 'anthropicApiKey' | 'requestTimeoutMs' | 'maxRetries'>,
  logger: Logger = new NullLogger()
): GenerationClient {
  const provider = detectProvider(config.model);
  logger.debug(`Generation provider: ${provider} (model: ${config.model})`);

  switch (provider) {
    case 'anthropic': {
      if (!config.anthropicApiKey) {
        throw new ConfigError(`ANTHROPIC_API_KEY is required for model ${config.model}`);
      }
      const client = new Anthropic({
        apiKey: config.anthropicApiKey,
        timeout: config.requestTimeoutMs,
        maxRetries: 0,
      });
      return new AnthropicClient(config.model, client, config.maxRetries, logger);
    }

    case 'openai': {
      if (!config.openaiApiKey) {
        throw new ConfigError(`OPENAI_API_KEY is required for model ${config.model}`);
      }
      const client = new OpenAI({
        apiKey: config.openaiApiKey,
        timeout: config.requestTimeoutMs,
        maxRetries: 0,
      });
      return new OpenAICompatibleClient('openai', config.model, client, config.maxRetries, logger);
    }

    case 'ollama': {
      const client = new OpenAI({
        // Ollama ignores the key but the SDK requires one
        apiKey: 'ollama',
        baseURL: `${config.ollamaHost.replace(/\/+$/, '')}/v1`,
        timeout: config.requestTimeoutMs,
        maxRetries: 0,
      });
      return new OpenAICompatibleClient('ollama', config.model, client, config.maxRetries, logger);
    }
  }
}
