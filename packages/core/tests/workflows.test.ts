import { describe, it, expect } from 'vitest';
import { AgentExhaustedError, ValidationError, parseExchangeRecord } from '@refract/shared';
import { AgentManager } from '../src/agent-manager.js';
import { MemoryTraceSink } from '../src/tracer.js';
import { Workflows } from '../src/workflows.js';
import { ScriptedProvider, makeContext, type ScriptStep } from './helpers.js';

function setup(steps: ScriptStep[], maxRetries = 2) {
  const provider = new ScriptedProvider(steps);
  const sink = new MemoryTraceSink();
  const context = makeContext({ provider, traceSink: sink, maxRetries });
  return { provider, sink, workflows: new Workflows(context, new AgentManager(context)) };
}

describe('Workflows.summarizeWithValidation', () => {
  it('summarizes, validates and traces both steps', async () => {
    const { provider, sink, workflows } = setup(['Short summary.', 'Accurate. Rating: 5']);

    const result = await workflows.summarizeWithValidation('Long clinical note.', { taskId: 'sum-1' });

    expect(result).toMatchObject({ taskId: 'sum-1', summary: 'Short summary.', validation: 'Accurate. Rating: 5' });
    expect(result.exchange.verdict).toBe('validated');
    expect(result.exchange.messages.map(m => [m.role, m.sender])).toEqual([
      ['user', 'user'],
      ['agent', 'SummarizeTool'],
      ['validator', 'SummarizeValidatorAgent'],
    ]);
    expect(result.exchange).toMatchObject({ costTokensPrompt: 20, costTokensOutput: 10 });
    expect(provider.calls[1].messages[1].content).toContain('Summary:\nShort summary.\n\nValidation:');
    expect(sink.lines('sum-1')).toHaveLength(1);
  });

  it('generates a task id when none is given', async () => {
    const { workflows } = setup(['s', 'v']);

    const result = await workflows.summarizeWithValidation('text');

    expect(result.taskId).toMatch(/^task_[0-9a-f-]{36}$/);
  });
});

describe('Workflows.writeAndRefineArticle', () => {
  it('drafts, refines and validates the refined article', async () => {
    const { provider, workflows } = setup(['draft text', 'refined text', 'Rating: 4']);

    const result = await workflows.writeAndRefineArticle('Telemedicine', 'Intro, Outcomes', { taskId: 'art-1' });

    expect(result).toMatchObject({ draft: 'draft text', refined: 'refined text', final: 'refined text', validation: 'Rating: 4' });
    expect(result.reflection).toBeUndefined();
    expect(result.exchange.messages.map(m => m.sender)).toEqual(['user', 'WriteArticleTool', 'RefinerAgent', 'ValidatorAgent']);
    expect(result.exchange.messages[0].content).toBe('Topic: Telemedicine\n\nOutline:\nIntro, Outcomes');
    expect(provider.calls[0].messages[1].content).toBe(
      'Write a research article on the following topic:\nTopic: Telemedicine\n\nOutline:\nIntro, Outcomes\n\nArticle:\n',
    );
    expect(provider.calls[2].messages[1].content).toContain('Article:\nrefined text\n\nValidation:');
    expect(provider.calls[2].params).toEqual({ temperature: 0.3, maxTokens: 500 });
  });

  it('runs the critique loop under its own task id when reflecting', async () => {
    const { sink, workflows } = setup([
      'draft text',
      'refined text',
      'missing outcomes',
      'revised text',
      '{"revise_required": false}',
      'Rating: 5',
    ]);

    const result = await workflows.writeAndRefineArticle('Telemedicine', undefined, {
      taskId: 'art-2',
      reflect: true,
      maxRevisions: 1,
    });

    expect(result.final).toBe('revised text');
    expect(result.reflection).toMatchObject({ verdict: 'pass', critiqueCalls: 2, revisionCalls: 1 });
    expect(sink.taskIds().sort()).toEqual(['art-2', 'art-2-reflect']);
    expect(result.exchange.messages.map(m => m.sender)).toEqual([
      'user',
      'WriteArticleTool',
      'RefinerAgent',
      'RefinerAgent-reviser',
      'ValidatorAgent',
    ]);
    expect(result.exchange.messages[4].content).toBe('Rating: 5');
  });
});

describe('Workflows.sanitizeWithValidation', () => {
  it('rejects empty input without calling the model', async () => {
    const { provider, sink, workflows } = setup(['unused']);

    await expect(workflows.sanitizeWithValidation('   ')).rejects.toThrow(ValidationError);
    expect(provider.calls).toHaveLength(0);
    expect(sink.taskIds()).toEqual([]);
  });

  it('finalizes agent_failure before rethrowing', async () => {
    const { sink, workflows } = setup([new Error('offline')], 1);

    await expect(workflows.sanitizeWithValidation('Name: Test Patient', { taskId: 'san-1' })).rejects.toThrow(
      AgentExhaustedError,
    );

    const exchange = parseExchangeRecord(sink.lines('san-1')[0]);
    expect(exchange.verdict).toBe('agent_failure');
    expect(exchange.messages.map(m => m.role)).toEqual(['user']);
  });

  it('passes the original and sanitized data to the validator', async () => {
    const { provider, workflows } = setup(['Name: [REDACTED]', 'No PHI remains. Rating: 5']);

    const result = await workflows.sanitizeWithValidation('Name: Test Patient', { taskId: 'san-2' });

    expect(result.sanitized).toBe('Name: [REDACTED]');
    expect(provider.calls[1].messages[1].content).toContain(
      'Original Data:\nName: Test Patient\n\nSanitized Data:\nName: [REDACTED]\n\nValidation:',
    );
  });
});
