/**
 * Chat Command
 *
 * tagdigest chat            - interactive session over the summaries
 * tagdigest chat -q "..."   - one question, one answer
 */

import type { Command } from 'commander';
import { existsSync } from 'fs';

import { SummaryChat } from '../../core/chat.js';
import { loadConfig } from '../../core/config.js';
import { createGenerationClient } from '../../core/llm.js';
import { createLogger } from '../../core/logger.js';
import { c } from '../colors.js';
import { exitWithError, resolveSummariesDir, truncate } from '../helpers.js';

interface ChatCommandOptions {
  summaries?: string;
  model?: string;
  question?: string;
  verbose?: boolean;
}

async function runSession(chat: SummaryChat): Promise<void> {
  const readline = await import('readline');
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  let closed = false;
  rl.on('close', () => {
    closed = true;
  });

  // Resolves null once input ends (Ctrl-D or a closed pipe)
  const prompt = (question: string): Promise<string | null> =>
    new Promise((resolve) => {
      if (closed) {
        resolve(null);
        return;
      }
      const onClose = (): void => resolve(null);
      rl.once('close', onClose);
      rl.question(question, (answer) => {
        rl.off('close', onClose);
        resolve(answer);
      });
    });

  console.log(c.dim('Ask about your summaries. Commands: /clear, /history, /exit\n'));

  try {
    for (;;) {
      const line = await prompt(c.bold('you> '));
      if (line === null) break;

      const input = line.trim();
      if (!input) continue;

      if (input === '/exit' || input === '/quit') break;

      if (input === '/clear') {
        chat.clearHistory();
        console.log(c.dim('History cleared.\n'));
        continue;
      }

      if (input === '/history') {
        const history = chat.getHistory();
        if (history.length === 0) {
          console.log(c.dim('No messages yet.\n'));
          continue;
        }
        for (const message of history) {
          const time = message.timestamp.toISOString().slice(11, 19);
          console.log(`${c.dim(time)} ${message.role === 'user' ? 'you' : 'ai '}: ${truncate(message.content, 100)}`);
        }
        console.log('');
        continue;
      }

      const answer = await chat.ask(input);
      console.log(`\n${answer}\n`);
    }
  } finally {
    rl.close();
  }
}

export function registerChatCommand(program: Command): void {
  program
    .command('chat')
    .description('Ask questions about your generated summaries')
    .option('-s, --summaries <dir>', 'Summaries directory (default: configured dir or ./Summaries)')
    .option('-m, --model <model>', 'Model to answer with')
    .option('-q, --question <question>', 'Ask a single question and exit')
    .option('-v, --verbose', 'Debug logging')
    .action(async (options: ChatCommandOptions) => {
      const logger = createLogger(Boolean(options.verbose));

      try {
        const config = await loadConfig({ overrides: options.model ? { model: options.model } : {} });
        const summariesDir = resolveSummariesDir({ explicit: options.summaries, configured: config.summariesDir });
        if (!existsSync(summariesDir)) {
          exitWithError(`Summaries directory does not exist: ${summariesDir}`);
        }

        const chat = new SummaryChat({
          summariesDir,
          client: createGenerationClient(config, logger),
          logger,
        });

        if (options.question) {
          console.log(await chat.ask(options.question));
          return;
        }

        console.log(`\n${c.title('tagdigest chat')} ${c.dim(`(${config.model}, ${summariesDir})`)}`);
        await runSession(chat);
      } catch (error) {
        exitWithError(error);
      }
    });
}
