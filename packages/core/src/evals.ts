import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ValidationError, describeError, silentLogger, type Logger } from '@refract/shared';
import type { AgentManager } from './agent-manager.js';

export const DEFAULT_SMOKE_CASES_PATH = fileURLToPath(new URL('../evals/smoke-cases.json', import.meta.url));

const expectations = {
  mustContain: z.array(z.string().min(1)).default([]),
  mustNotContain: z.array(z.string().min(1)).default([]),
};

export const smokeCaseSchema = z.discriminatedUnion('task', [
  z.object({
    name: z.string().min(1),
    task: z.literal('summarize'),
    args: z.object({ text: z.string().min(1) }),
    ...expectations,
  }),
  z.object({
    name: z.string().min(1),
    task: z.literal('article'),
    args: z.object({ topic: z.string().min(1), outline: z.string().optional() }),
    ...expectations,
  }),
  z.object({
    name: z.string().min(1),
    task: z.literal('sanitize'),
    args: z.object({ medicalData: z.string().min(1) }),
    ...expectations,
  }),
]);

export type SmokeCase = z.infer<typeof smokeCaseSchema>;

export interface SmokeCaseResult {
  name: string;
  passed: boolean;
  failures: string[];
  output?: string;
  error?: string;
}

export interface SmokeReport {
  passed: number;
  total: number;
  results: SmokeCaseResult[];
}

export async function loadSmokeCases(path: string = DEFAULT_SMOKE_CASES_PATH): Promise<SmokeCase[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (e) {
    throw new ValidationError(`Cannot read smoke cases from ${path}: ${describeError(e)}`);
  }

  const parsed = z.array(smokeCaseSchema).safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new ValidationError(`Invalid smoke cases in ${path}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Runs each case straight through the task agents (no validators) and checks
 * the output with case-insensitive substring rules. A failing agent fails
 * only its own case.
 */
export async function runSmokeSuite(
  agents: AgentManager,
  cases: SmokeCase[],
  logger: Logger = silentLogger,
): Promise<SmokeReport> {
  const results: SmokeCaseResult[] = [];

  for (const [index, testCase] of cases.entries()) {
    logger.info(`Running smoke case ${index + 1}/${cases.length}: ${testCase.name}`);
    let output: string;
    try {
      output = await runCase(agents, testCase);
    } catch (e) {
      results.push({ name: testCase.name, passed: false, failures: [], error: describeError(e) });
      continue;
    }

    const failures = checkOutput(output, testCase);
    results.push({ name: testCase.name, passed: failures.length === 0, failures, output });
  }

  return {
    passed: results.filter(r => r.passed).length,
    total: cases.length,
    results,
  };
}

export function checkOutput(output: string, testCase: Pick<SmokeCase, 'mustContain' | 'mustNotContain'>): string[] {
  const haystack = output.toLowerCase();
  const failures: string[] = [];
  for (const needle of testCase.mustContain) {
    if (!haystack.includes(needle.toLowerCase())) {
      failures.push(`Expected '${needle}' to appear in result`);
    }
  }
  for (const needle of testCase.mustNotContain) {
    if (haystack.includes(needle.toLowerCase())) {
      failures.push(`Expected '${needle}' to be removed from result`);
    }
  }
  return failures;
}

async function runCase(agents: AgentManager, testCase: SmokeCase): Promise<string> {
  switch (testCase.task) {
    case 'summarize':
      return (await agents.get('summarize').execute(testCase.args)).text;
    case 'article': {
      const draft = await agents.get('write_article').execute(testCase.args);
      return (await agents.get('refiner').execute({ draft: draft.text })).text;
    }
    case 'sanitize':
      return (await agents.get('sanitize_data').execute(testCase.args)).text;
  }
}
