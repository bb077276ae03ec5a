import { describe, it, expect } from 'vitest';
import {
  createMessage,
  createExchange,
  serializeExchange,
  parseExchangeRecord,
  ValidationError,
  type Exchange,
  type MessageRole,
} from '../src/index.js';

describe('createMessage', () => {
  it('assigns an id and timestamp', () => {
    const msg = createMessage({ role: 'user', sender: 'user', content: 'Hello' });

    expect(msg.id).toMatch(/^msg_[0-9a-f-]{36}$/);
    expect(Number.isNaN(Date.parse(msg.ts))).toBe(false);
    expect(msg.role).toBe('user');
    expect(msg.sender).toBe('user');
    expect(msg.content).toBe('Hello');
    expect(msg).not.toHaveProperty('toolName');
  });

  it('generates distinct ids', () => {
    const ids = new Set(
      Array.from({ length: 50 }, () => createMessage({ role: 'agent', sender: 'a', content: '' }).id),
    );
    expect(ids.size).toBe(50);
  });

  it('rejects roles outside the five known values', () => {
    const role = 'assistant' as unknown as MessageRole;
    expect(() => createMessage({ role, sender: 'x', content: 'y' })).toThrow(ValidationError);
  });

  it('accepts tool fields on tool messages only', () => {
    const toolMsg = createMessage({
      role: 'tool',
      sender: 'search',
      content: '3 results',
      toolName: 'search',
      toolArgs: { query: 'insulin' },
    });
    expect(toolMsg.toolName).toBe('search');
    expect(toolMsg.toolArgs).toEqual({ query: 'insulin' });

    expect(() =>
      createMessage({ role: 'agent', sender: 'a', content: 'b', toolName: 'search' }),
    ).toThrow('toolName and toolArgs are only allowed on tool messages');
  });
});

describe('createExchange', () => {
  it('starts empty with zero cost and no verdict', () => {
    expect(createExchange('t1')).toEqual({
      taskId: 't1',
      messages: [],
      costTokensPrompt: 0,
      costTokensOutput: 0,
      latencyMs: null,
      verdict: null,
    });
  });

  it('rejects an empty task id', () => {
    expect(() => createExchange('')).toThrow(ValidationError);
  });
});

describe('exchange records', () => {
  function sampleExchange(): Exchange {
    const exchange = createExchange('task-42');
    exchange.messages.push(
      createMessage({ role: 'user', sender: 'user', content: 'Summarize this' }),
      createMessage({ role: 'agent', sender: 'SummarizeTool', content: 'Short "quoted"\nsummary' }),
      createMessage({ role: 'tool', sender: 'lookup', content: 'ok', toolName: 'lookup', toolArgs: { id: 7, tags: ['a'] } }),
      createMessage({ role: 'validator', sender: 'critic', content: '{"revise_required": false}' }),
    );
    exchange.costTokensPrompt = 120;
    exchange.costTokensOutput = 45;
    exchange.latencyMs = 830;
    exchange.verdict = 'pass';
    return exchange;
  }

  it('serializes to a single line with snake_case fields', () => {
    const line = serializeExchange(sampleExchange());

    expect(line).not.toContain('\n');
    const raw = JSON.parse(line);
    expect(Object.keys(raw)).toEqual([
      'task_id',
      'messages',
      'cost_tokens_prompt',
      'cost_tokens_output',
      'latency_ms',
      'verdict',
    ]);
    expect(Object.keys(raw.messages[0])).toEqual(['id', 'role', 'sender', 'content', 'ts']);
    expect(Object.keys(raw.messages[2])).toEqual(['id', 'role', 'sender', 'content', 'tool_name', 'tool_args', 'ts']);
  });

  it('parses back every field exactly', () => {
    const original = sampleExchange();
    const restored = parseExchangeRecord(serializeExchange(original));
    expect(restored).toEqual(original);
  });

  it('keeps null latency and verdict', () => {
    const exchange = createExchange('pending');
    const restored = parseExchangeRecord(serializeExchange(exchange));
    expect(restored.latencyMs).toBeNull();
    expect(restored.verdict).toBeNull();
  });

  it('reads records that carry explicit null tool fields', () => {
    const line = JSON.stringify({
      task_id: 'legacy',
      messages: [
        { id: 'm1', role: 'user', sender: 'user', content: 'hi', tool_name: null, tool_args: null, ts: '2024-01-01T00:00:00' },
      ],
      cost_tokens_prompt: 0,
      cost_tokens_output: 0,
      latency_ms: 12,
      verdict: null,
    });

    const exchange = parseExchangeRecord(line);
    expect(exchange.messages[0]).toEqual({
      id: 'm1',
      role: 'user',
      sender: 'user',
      content: 'hi',
      ts: '2024-01-01T00:00:00',
    });
  });

  it('rejects lines that are not JSON', () => {
    expect(() => parseExchangeRecord('{"task_id": ')).toThrow(ValidationError);
  });

  it('rejects records with an unknown role', () => {
    const line = JSON.stringify({
      task_id: 't',
      messages: [{ id: 'm', role: 'robot', sender: 's', content: 'c', ts: 'now' }],
      cost_tokens_prompt: 0,
      cost_tokens_output: 0,
      latency_ms: null,
      verdict: null,
    });
    expect(() => parseExchangeRecord(line)).toThrow(/^Invalid trace record: messages\.0\.role/);
  });
});
