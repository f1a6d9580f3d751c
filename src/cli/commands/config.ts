/**
 * Config Commands
 *
 * tagdigest config show
 * tagdigest config set <key> <value>
 */

import type { Command } from 'commander';

import { getConfigPath, loadConfig, setConfigValue, SETTABLE_KEYS } from '../../core/config.js';
import { detectProvider } from '../../core/llm.js';
import { c } from '../colors.js';
import { exitWithError } from '../helpers.js';

function mask(value: string | undefined): string {
  if (!value) return c.dim('(not set)');
  return value.length <= 8 ? '****' : `${value.slice(0, 4)}…${value.slice(-4)}`;
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command('config')
    .description('Show or change settings');

  configCmd
    .command('show')
    .description('Print the resolved configuration')
    .action(async () => {
      try {
        const config = await loadConfig();
        console.log(`\n${c.title('Configuration')} ${c.path(getConfigPath())}\n`);
        console.log(`  model:                ${config.model} ${c.dim(`(${detectProvider(config.model)})`)}`);
        console.log(`  ollama_host:          ${config.ollamaHost}`);
        console.log(`  max_batch_size:       ${config.maxBatchSize}`);
        console.log(`  max_tokens_per_batch: ${config.maxTokensPerBatch}`);
        console.log(`  summaries_dir:        ${config.summariesDir ?? c.dim('(<vault>/Summaries)')}`);
        console.log(`  request_timeout_ms:   ${config.requestTimeoutMs}`);
        console.log(`  max_retries:          ${config.maxRetries}`);
        console.log(`  OPENAI_API_KEY:       ${mask(config.openaiApiKey)}`);
        console.log(`  ANTHROPIC_API_KEY:    ${mask(config.anthropicApiKey)}\n`);
      } catch (error) {
        exitWithError(error);
      }
    });

  configCmd
    .command('set')
    .description(`Set a value (${SETTABLE_KEYS.join(', ')})`)
    .argument('<key>', 'Config key')
    .argument('<value>', 'New value')
    .action(async (key: string, value: string) => {
      try {
        await setConfigValue(key, value);
        console.log(c.success(`Set ${key} = ${value}`));
      } catch (error) {
        exitWithError(error);
      }
    });
}
