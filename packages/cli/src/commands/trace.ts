import { Command } from 'commander';
import { ValidationError } from '@refract/shared';
import { listTraceFiles, readLatestSnapshot, readTraceSnapshots } from '@refract/core';
import { globalOptions, loadCliConfig } from '../setup.js';
import { formatExchange, formatTraceFile } from '../output/formatter.js';
import { parseInteger } from './input.js';

export const traceCommand = new Command('trace')
  .description('Inspect recorded traces');

traceCommand
  .command('list')
  .description('Summarize the most recent trace files')
  .option('-n, --limit <n>', 'Number of files', parseInteger, 10)
  .action(async (options: { limit: number }, command: Command) => {
    const config = (await loadCliConfig(globalOptions(command))).getAll();
    const files = await listTraceFiles(config.tracing.dir, options.limit);
    if (files.length === 0) {
      console.log(`No trace files found in ${config.tracing.dir}. Run some tasks first to generate traces.`);
      return;
    }
    for (const file of files) {
      console.log(formatTraceFile(await readTraceSnapshots(file)));
    }
  });

traceCommand
  .command('show')
  .description('Show the latest recorded state of a task')
  .argument('<task-id>', 'Task id')
  .option('--json', 'Output as JSON')
  .action(async (taskId: string, options: { json?: boolean }, command: Command) => {
    const config = (await loadCliConfig(globalOptions(command))).getAll();
    const exchange = await readLatestSnapshot(config.tracing.dir, taskId);
    if (!exchange) {
      throw new ValidationError(`No trace found for task '${taskId}' in ${config.tracing.dir}`);
    }
    console.log(options.json ? JSON.stringify(exchange, null, 2) : formatExchange(exchange));
  });
