/**
 * Summary Chat
 *
 * Answers questions from the generated summaries: each turn searches the
 * summaries directory, hands the best excerpts to the generation client and
 * records both sides of the exchange.
 */

import { errorMessage } from './errors.js';
import type { GenerationClient } from './llm.js';
import { NullLogger, type Logger } from './logger.js';
import { DEFAULT_SEARCH_LIMIT, searchDocuments } from './retriever.js';
import { loadSummaryDocuments } from './summaries.js';
import { formatIsoDate } from './temporal.js';
import type { ChatMessage, ChatRole, SearchResult } from './types.js';

export const NO_RESULTS_MESSAGE =
  "I couldn't find any relevant information in the summaries for your question.";
export const GENERATION_FAILED_MESSAGE =
  "I'm sorry, I couldn't generate a response due to a technical issue.";

export function buildChatContext(results: readonly SearchResult[]): string {
  return results
    .map((result, i) => {
      const date = result.date ? formatIsoDate(result.date) : 'Unknown date';
      return `Summary ${i + 1} (${date}, #${result.hashtag}):\n${result.excerpt}\n`;
    })
    .join('\n');
}

export function buildChatPrompt(question: string, context: string): string {
  return `You are a helpful assistant that answers questions about journal summaries.

Context from summaries:
${context}

User question: ${question}

Please answer the question based on the context provided. If the information isn't in the context, say so. Be concise and helpful.`;
}

export interface SummaryChatOptions {
  summariesDir: string;
  client: GenerationClient;
  logger?: Logger;
  searchLimit?: number;
  now?: () => Date;
}

export class SummaryChat {
  private history: ChatMessage[] = [];
  private logger: Logger;
  private now: () => Date;

  constructor(private options: SummaryChatOptions) {
    this.logger = options.logger ?? new NullLogger();
    this.now = options.now ?? (() => new Date());
  }

  async search(query: string, limit = this.options.searchLimit ?? DEFAULT_SEARCH_LIMIT): Promise<SearchResult[]> {
    const documents = await loadSummaryDocuments(this.options.summariesDir, this.logger);
    return searchDocuments(documents, query, { limit });
  }

  /** One user turn. Never rejects: failures come back as the reply text. */
  async ask(message: string): Promise<string> {
    this.record('user', message);

    let reply: string;
    try {
      const results = await this.search(message);
      reply = results.length === 0 ? NO_RESULTS_MESSAGE : await this.generateReply(message, results);
    } catch (error) {
      this.logger.error(`Chat failed: ${errorMessage(error)}`);
      reply = `Sorry, I encountered an error: ${errorMessage(error)}`;
    }

    this.record('assistant', reply);
    return reply;
  }

  getHistory(): ChatMessage[] {
    return [...this.history];
  }

  clearHistory(): void {
    this.history = [];
  }

  private async generateReply(question: string, results: readonly SearchResult[]): Promise<string> {
    const prompt = buildChatPrompt(question, buildChatContext(results));
    try {
      return (await this.options.client.generate(prompt)).trim();
    } catch (error) {
      this.logger.error(`Generation failed: ${errorMessage(error)}`);
      return GENERATION_FAILED_MESSAGE;
    }
  }

  private record(role: ChatRole, content: string): void {
    this.history.push({ role, content, timestamp: this.now() });
  }
}
