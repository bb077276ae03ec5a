#!/usr/bin/env -S npx tsx
import { Command } from 'commander';
import { RefractError, describeError } from '@refract/shared';
import { runCommand } from '../src/commands/run.js';
import { reflectCommand } from '../src/commands/reflect.js';
import { traceCommand } from '../src/commands/trace.js';
import { configCommand } from '../src/commands/config.js';
import { evalCommand } from '../src/commands/eval.js';
import { serveCommand } from '../src/commands/serve.js';

const program = new Command();

program
  .name('refract')
  .description('Refract - traced multi-agent runs with validation and critique')
  .version('0.1.0')
  .option('-c, --config <path>', 'Config file (default: refract.config.yaml searched upwards)')
  .option('--ollama', 'Use the local Ollama backend')
  .option('--trace-dir <dir>', 'Directory for trace files')
  .option('--log-level <level>', 'debug, info, warn or error')
  .option('-q, --quiet', 'Do not preview model messages');

program.addCommand(runCommand);
program.addCommand(reflectCommand);
program.addCommand(traceCommand);
program.addCommand(configCommand);
program.addCommand(evalCommand);
program.addCommand(serveCommand);

program.parseAsync().catch((e: unknown) => {
  console.error(`Error: ${describeError(e)}`);
  process.exitCode = e instanceof RefractError && e.kind === 'caller_config' ? 2 : 1;
});
