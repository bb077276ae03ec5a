import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ValidationError } from '@refract/shared';
import { AgentManager } from '../src/agent-manager.js';
import { checkOutput, loadSmokeCases, runSmokeSuite, type SmokeCase } from '../src/evals.js';
import { ScriptedProvider, makeContext } from './helpers.js';

describe('loadSmokeCases', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('loads the bundled cases', async () => {
    const cases = await loadSmokeCases();

    expect(cases.map(c => c.task)).toEqual(['summarize', 'article', 'sanitize']);
    expect(cases[0].mustNotContain).toEqual([]);
  });

  it('rejects cases with unknown tasks', async () => {
    dir = mkdtempSync(join(tmpdir(), 'refract-evals-'));
    const path = join(dir, 'cases.json');
    writeFileSync(path, JSON.stringify([{ name: 'x', task: 'translate', args: {} }]));

    await expect(loadSmokeCases(path)).rejects.toThrow(ValidationError);
  });

  it('rejects unreadable files', async () => {
    await expect(loadSmokeCases('/nonexistent/cases.json')).rejects.toThrow(/^Cannot read smoke cases/);
  });
});

describe('checkOutput', () => {
  it('compares case-insensitively', () => {
    expect(checkOutput('Insulin resistance', { mustContain: ['INSULIN'], mustNotContain: ['glucose'] })).toEqual([]);
  });

  it('reports each broken rule', () => {
    expect(checkOutput('Patient Test Person', { mustContain: ['summary'], mustNotContain: ['test person'] })).toEqual([
      "Expected 'summary' to appear in result",
      "Expected 'test person' to be removed from result",
    ]);
  });
});

describe('runSmokeSuite', () => {
  const cases: SmokeCase[] = [
    { name: 'sum', task: 'summarize', args: { text: 'note' }, mustContain: ['kidney'], mustNotContain: [] },
    { name: 'art', task: 'article', args: { topic: 'AI' }, mustContain: ['refined'], mustNotContain: [] },
    { name: 'san', task: 'sanitize', args: { medicalData: 'Name: Test' }, mustContain: [], mustNotContain: ['test'] },
  ];

  it('counts passing cases and keeps going after failures', async () => {
    const provider = new ScriptedProvider(['Kidney function declined.', 'draft', 'Refined article', new Error('down')]);
    const agents = new AgentManager(makeContext({ provider, maxRetries: 1 }));

    const report = await runSmokeSuite(agents, cases);

    expect(report.passed).toBe(2);
    expect(report.total).toBe(3);
    expect(report.results.map(r => r.passed)).toEqual([true, true, false]);
    expect(report.results[2].error).toBe('[SanitizeDataTool] Failed to get response after 1 attempts');
    expect(provider.calls[2].messages[1].content).toContain('draft\n\nRefined Article:');
  });

  it('records rule failures against the output', async () => {
    const provider = new ScriptedProvider(['Nothing relevant.']);
    const agents = new AgentManager(makeContext({ provider }));

    const report = await runSmokeSuite(agents, [cases[0]]);

    expect(report.results[0]).toEqual({
      name: 'sum',
      passed: false,
      failures: ["Expected 'kidney' to appear in result"],
      output: 'Nothing relevant.',
    });
  });
});
