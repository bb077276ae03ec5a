import { Command } from 'commander';
import type { RefractConfig } from '@refract/shared';
import { CONFIG_FILE_NAMES } from '@refract/core';
import { globalOptions, loadCliConfig } from '../setup.js';

export const configCommand = new Command('config')
  .description('Manage Refract configuration');

configCommand
  .command('show')
  .description('Show the effective configuration')
  .action(async (_options: unknown, command: Command) => {
    const manager = await loadCliConfig(globalOptions(command));
    const source = manager.getSource();
    console.log(`# source: ${source ?? 'defaults and environment'}`);
    console.log(JSON.stringify(redact(manager.getAll()), null, 2));
  });

configCommand
  .command('path')
  .description('Show config file search paths')
  .action(() => {
    console.log('Config files searched from the working directory upwards (first found wins):');
    CONFIG_FILE_NAMES.forEach((name, i) => console.log(`  ${i + 1}. ./${name}`));
    console.log('');
    console.log('Environment variables:');
    for (const name of ENV_VARS) {
      console.log(`  ${name}`);
    }
  });

const ENV_VARS = [
  'USE_OLLAMA',
  'OPENAI_API_KEY',
  'OPENAI_MODEL',
  'OLLAMA_MODEL',
  'OLLAMA_BASE_URL',
  'TRACE_DIR',
  'REFRACT_MAX_RETRIES',
  'REFRACT_MAX_REVISIONS',
  'REFRACT_LOG_LEVEL',
  'REFRACT_SERVER_PORT',
];

export function redact(config: RefractConfig): RefractConfig {
  const copy = structuredClone(config);
  if (copy.providers.openai.apiKey) {
    copy.providers.openai.apiKey = '********';
  }
  return copy;
}
