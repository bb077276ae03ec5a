import { Command } from 'commander';
import { generateId } from '@refract/shared';
import { reflectiveImprove } from '@refract/core';
import { createCliRuntime } from '../setup.js';
import { formatReflectResult } from '../output/formatter.js';
import { parseInteger, readInput } from './input.js';

interface ReflectCommandOptions {
  task: string;
  file?: string;
  agent: string;
  maxRevisions?: number;
  taskId?: string;
  json?: boolean;
}

export const reflectCommand = new Command('reflect')
  .description('Critique and revise a draft until the critic approves')
  .argument('[draft]', 'Draft text')
  .requiredOption('-t, --task <description>', 'What the draft is supposed to accomplish')
  .option('-f, --file <path>', 'Read the draft from a file')
  .option('-a, --agent <name>', 'Name of the agent that produced the draft', 'author')
  .option('--max-revisions <n>', 'Revision cycles after the first', parseInteger)
  .option('--task-id <id>', 'Trace under this task id')
  .option('--json', 'Output as JSON')
  .action(async (draft: string | undefined, options: ReflectCommandOptions, command: Command) => {
    const input = await readInput('a draft', draft, options.file);
    const { context } = await createCliRuntime(command);
    const result = await reflectiveImprove(context, {
      taskId: options.taskId ?? generateId('reflect'),
      agentName: options.agent,
      taskDescription: options.task,
      draft: input,
      maxRevisions: options.maxRevisions,
    });
    console.log(options.json ? JSON.stringify(result, null, 2) : formatReflectResult(result));
  });
