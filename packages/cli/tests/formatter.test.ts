import { describe, it, expect } from 'vitest';
import type { Exchange } from '@refract/shared';
import {
  formatExchange,
  formatExchangeHeader,
  formatSmokeReport,
  formatSummarizeResult,
  formatTraceFile,
} from '../src/output/formatter.js';
import { redact } from '../src/commands/config.js';
import { DEFAULT_CONFIG } from '@refract/shared';

const exchange: Exchange = {
  taskId: 'task-7',
  messages: [
    { id: 'msg_1', role: 'user', sender: 'user', content: 'Summarize this', ts: '2024-05-01T10:00:00.000Z' },
    { id: 'msg_2', role: 'agent', sender: 'SummarizeTool', content: 'Line one\nLine two', ts: '2024-05-01T10:00:01.000Z' },
    {
      id: 'msg_3',
      role: 'tool',
      sender: 'runner',
      content: '{}',
      toolName: 'lookup',
      toolArgs: { q: 'x' },
      ts: '2024-05-01T10:00:02.000Z',
    },
  ],
  costTokensPrompt: 120,
  costTokensOutput: 45,
  latencyMs: 812,
  verdict: 'validated',
};

describe('formatExchangeHeader', () => {
  it('summarizes verdict, latency and tokens', () => {
    expect(formatExchangeHeader(exchange)).toBe(
      'Task task-7 | verdict: validated | latency: 812ms | tokens: 120 prompt / 45 output',
    );
  });

  it('marks unfinalized fields', () => {
    expect(formatExchangeHeader({ ...exchange, latencyMs: null, verdict: null })).toBe(
      'Task task-7 | verdict: none | latency: n/a | tokens: 120 prompt / 45 output',
    );
  });
});

describe('formatExchange', () => {
  it('lists messages in order with multi-line content indented', () => {
    expect(formatExchange(exchange).split('\n')).toEqual([
      'Task task-7 | verdict: validated | latency: 812ms | tokens: 120 prompt / 45 output',
      '  [user] user: Summarize this',
      '  [agent] SummarizeTool: Line one',
      '  Line two',
      '  [tool] runner (lookup): {}',
    ]);
  });
});

describe('formatTraceFile', () => {
  it('notes skipped lines', () => {
    expect(formatTraceFile({ path: 'traces/task-7.jsonl', exchanges: [exchange], skipped: 1 })).toBe(
      'traces/task-7.jsonl\n'
      + '  Task task-7 | verdict: validated | latency: 812ms | tokens: 120 prompt / 45 output\n'
      + '  (1 unreadable line skipped)',
    );
  });
});

describe('formatSummarizeResult', () => {
  it('prints the summary and validation sections', () => {
    const text = formatSummarizeResult({ taskId: 'task-7', summary: 'Short.', validation: 'Rating: 5', exchange });
    expect(text).toBe(
      '--- Summary ---\nShort.\n\n--- Validation ---\nRating: 5\n\n'
      + 'Task task-7 | verdict: validated | latency: 812ms | tokens: 120 prompt / 45 output',
    );
  });
});

describe('formatSmokeReport', () => {
  it('shows each case and the pass count', () => {
    const text = formatSmokeReport({
      passed: 1,
      total: 3,
      results: [
        { name: 'sum', passed: true, failures: [], output: 'ok' },
        { name: 'art', passed: false, failures: ["Expected 'x' to appear in result"], output: 'y' },
        { name: 'san', passed: false, failures: [], error: 'boom' },
      ],
    });
    expect(text).toBe([
      'Test 1/3: sum',
      '  [PASS]',
      'Test 2/3: art',
      "  [FAIL] Expected 'x' to appear in result",
      'Test 3/3: san',
      '  [ERROR] boom',
      '',
      '1/3 tests passed.',
    ].join('\n'));
  });
});

describe('redact', () => {
  it('masks the API key without touching the original', () => {
    const config = structuredClone(DEFAULT_CONFIG);
    config.providers.openai.apiKey = 'test-secret';

    expect(redact(config).providers.openai.apiKey).toBe('********');
    expect(config.providers.openai.apiKey).toBe('test-secret');
  });
});
