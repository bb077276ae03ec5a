import { Command } from 'commander';
import { createCliRuntime } from '../setup.js';
import { formatArticleResult, formatSanitizeResult, formatSummarizeResult } from '../output/formatter.js';
import { parseInteger, readInput } from './input.js';

interface TaskOptions {
  taskId?: string;
  file?: string;
  json?: boolean;
}

interface ArticleCommandOptions extends TaskOptions {
  outline?: string;
  reflect?: boolean;
  maxRevisions?: number;
}

export const runCommand = new Command('run')
  .description('Run a task with its validation pass');

runCommand
  .command('summarize')
  .description('Summarize medical text, then validate the summary')
  .argument('[text]', 'Text to summarize')
  .option('-f, --file <path>', 'Read the text from a file')
  .option('--task-id <id>', 'Trace under this task id')
  .option('--json', 'Output as JSON')
  .action(async (text: string | undefined, options: TaskOptions, command: Command) => {
    const input = await readInput('text', text, options.file);
    const { workflows } = await createCliRuntime(command);
    const result = await workflows.summarizeWithValidation(input, { taskId: options.taskId });
    console.log(options.json ? JSON.stringify(result, null, 2) : formatSummarizeResult(result));
  });

runCommand
  .command('article')
  .description('Write, refine and validate a research article')
  .argument('<topic>', 'Article topic')
  .option('-o, --outline <outline>', 'Optional outline')
  .option('--reflect', 'Review the refined article with the critique loop')
  .option('--max-revisions <n>', 'Revision cycles for --reflect', parseInteger)
  .option('--task-id <id>', 'Trace under this task id')
  .option('--json', 'Output as JSON')
  .action(async (topic: string, options: ArticleCommandOptions, command: Command) => {
    const { workflows } = await createCliRuntime(command);
    const result = await workflows.writeAndRefineArticle(topic, options.outline, {
      taskId: options.taskId,
      reflect: options.reflect,
      maxRevisions: options.maxRevisions,
    });
    console.log(options.json ? JSON.stringify(result, null, 2) : formatArticleResult(result));
  });

runCommand
  .command('sanitize')
  .description('Remove PHI from medical data, then validate the result')
  .argument('[data]', 'Medical data to sanitize')
  .option('-f, --file <path>', 'Read the data from a file')
  .option('--task-id <id>', 'Trace under this task id')
  .option('--json', 'Output as JSON')
  .action(async (data: string | undefined, options: TaskOptions, command: Command) => {
    const input = await readInput('medical data', data, options.file);
    const { workflows } = await createCliRuntime(command);
    const result = await workflows.sanitizeWithValidation(input, { taskId: options.taskId });
    console.log(options.json ? JSON.stringify(result, null, 2) : formatSanitizeResult(result));
  });
