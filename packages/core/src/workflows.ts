import {
  AgentExhaustedError,
  ValidationError,
  createMessage,
  generateId,
  type Exchange,
  type TokenUsage,
} from '@refract/shared';
import type { PromptAgent } from './agent-base.js';
import type { AgentManager } from './agent-manager.js';
import type { RuntimeContext } from './context.js';
import { reflectiveImprove, type ReflectResult } from './reflection.js';
import { Tracer } from './tracer.js';

export interface WorkflowOptions {
  taskId?: string;
}

export interface ArticleOptions extends WorkflowOptions {
  /** Run the refined article through the critique loop before validation */
  reflect?: boolean;
  maxRevisions?: number;
}

export interface SummarizeResult {
  taskId: string;
  summary: string;
  validation: string;
  exchange: Exchange;
}

export interface ArticleResult {
  taskId: string;
  draft: string;
  refined: string;
  /** Refined article after the critique loop, or the refined article itself */
  final: string;
  validation: string;
  reflection?: ReflectResult;
  exchange: Exchange;
}

export interface SanitizeResult {
  taskId: string;
  sanitized: string;
  validation: string;
  exchange: Exchange;
}

/**
 * One traced unit of work: agent outputs are logged in call order, token
 * usage accumulates, and the trace is finalized once, as `validated` or as
 * `agent_failure` before the error propagates.
 */
class TracedRun {
  readonly tracer: Tracer;
  private usage: TokenUsage = { promptTokens: 0, outputTokens: 0 };

  constructor(readonly taskId: string, context: RuntimeContext) {
    this.tracer = new Tracer(taskId, { sink: context.traceSink, logger: context.logger });
  }

  input(content: string): void {
    this.tracer.log(createMessage({ role: 'user', sender: 'user', content }));
  }

  async step<TInput>(agent: PromptAgent<TInput>, input: TInput, role: 'agent' | 'validator' = 'agent'): Promise<string> {
    const reply = await agent.execute(input);
    this.usage = {
      promptTokens: this.usage.promptTokens + reply.usage.promptTokens,
      outputTokens: this.usage.outputTokens + reply.usage.outputTokens,
    };
    this.tracer.log(createMessage({ role, sender: agent.name, content: reply.text }));
    return reply.text;
  }

  async run<T extends object>(body: () => Promise<T>): Promise<T & { exchange: Exchange }> {
    try {
      const result = await body();
      this.tracer.finalize({ verdict: 'validated', ...this.usage });
      return { ...result, exchange: this.tracer.snapshot() };
    } catch (e) {
      if (e instanceof AgentExhaustedError) {
        this.tracer.finalize({ verdict: 'agent_failure', ...this.usage });
      }
      throw e;
    }
  }
}

export class Workflows {
  constructor(
    private readonly context: RuntimeContext,
    private readonly agents: AgentManager,
  ) {}

  async summarizeWithValidation(text: string, options: WorkflowOptions = {}): Promise<SummarizeResult> {
    requireText('text', text);
    const run = this.begin(options);
    run.input(text);

    return run.run(async () => {
      const summary = await run.step(this.agents.get('summarize'), { text });
      const validation = await run.step(
        this.agents.get('summarize_validator'),
        { originalText: text, summary },
        'validator',
      );
      return { taskId: run.taskId, summary, validation };
    });
  }

  async writeAndRefineArticle(topic: string, outline?: string, options: ArticleOptions = {}): Promise<ArticleResult> {
    requireText('topic', topic);
    const run = this.begin(options);
    run.input(outline ? `Topic: ${topic}\n\nOutline:\n${outline}` : `Topic: ${topic}`);

    return run.run(async () => {
      const draft = await run.step(this.agents.get('write_article'), { topic, outline });
      const refined = await run.step(this.agents.get('refiner'), { draft });

      let final = refined;
      let reflection: ReflectResult | undefined;
      if (options.reflect) {
        const refiner = this.agents.get('refiner');
        reflection = await reflectiveImprove(this.context, {
          taskId: `${run.taskId}-reflect`,
          agentName: refiner.name,
          taskDescription: `Write a research article on the following topic: ${topic}`,
          draft: refined,
          maxRevisions: options.maxRevisions,
        });
        final = reflection.draft;
        if (reflection.revisionCalls > 0) {
          run.tracer.log(createMessage({ role: 'agent', sender: `${refiner.name}-reviser`, content: final }));
        }
      }

      const validation = await run.step(this.agents.get('validator'), { topic, article: final }, 'validator');
      return {
        taskId: run.taskId,
        draft,
        refined,
        final,
        validation,
        ...(reflection ? { reflection } : {}),
      };
    });
  }

  async sanitizeWithValidation(medicalData: string, options: WorkflowOptions = {}): Promise<SanitizeResult> {
    requireText('medical data', medicalData);
    const run = this.begin(options);
    run.input(medicalData);

    return run.run(async () => {
      const sanitized = await run.step(this.agents.get('sanitize_data'), { medicalData });
      const validation = await run.step(
        this.agents.get('sanitize_data_validator'),
        { originalData: medicalData, sanitizedData: sanitized },
        'validator',
      );
      return { taskId: run.taskId, sanitized, validation };
    });
  }

  private begin(options: WorkflowOptions): TracedRun {
    return new TracedRun(options.taskId ?? generateId('task'), this.context);
  }
}

function requireText(field: string, value: string): void {
  if (value.trim() === '') {
    throw new ValidationError(`Please provide ${field}; it must not be empty`);
  }
}
