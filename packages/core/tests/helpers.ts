import {
  DEFAULT_CONFIG,
  type ChatMessage,
  type GenerateParams,
  type Logger,
  type LogLevel,
  type ModelProviderName,
  type ModelReply,
} from '@refract/shared';
import { ModelProvider } from '@refract/models';
import { MemoryTraceSink, type TraceSink } from '../src/tracer.js';
import type { RuntimeContext } from '../src/context.js';

export type ScriptStep = string | ModelReply | Error;

export const STEP_USAGE = { promptTokens: 10, outputTokens: 5 };

/** Replies with the scripted steps in order; a string step costs STEP_USAGE. */
export class ScriptedProvider extends ModelProvider {
  readonly name: ModelProviderName = 'ollama';
  readonly model = 'scripted';
  readonly calls: Array<{ messages: ChatMessage[]; params?: GenerateParams }> = [];
  private readonly queue: ScriptStep[];

  constructor(steps: ScriptStep[], private readonly fallback?: ScriptStep) {
    super();
    this.queue = [...steps];
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async generate(messages: ChatMessage[], params?: GenerateParams): Promise<ModelReply> {
    this.calls.push({ messages, params });
    const step = this.queue.shift() ?? this.fallback;
    if (step === undefined) throw new Error('script exhausted');
    if (step instanceof Error) throw step;
    return typeof step === 'string' ? { text: step, usage: { ...STEP_USAGE } } : step;
  }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
}

export function createRecordingLogger(): Logger & { entries: LogEntry[]; at(level: LogLevel): string[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    at: (level) => entries.filter(e => e.level === level).map(e => e.message),
    debug: (message) => entries.push({ level: 'debug', message }),
    info: (message) => entries.push({ level: 'info', message }),
    warn: (message) => entries.push({ level: 'warn', message }),
    error: (message) => entries.push({ level: 'error', message }),
  };
}

export function makeContext(options: {
  provider: ModelProvider;
  traceSink?: TraceSink;
  logger?: Logger;
  maxRetries?: number;
  maxRevisions?: number;
  verbose?: boolean;
}): RuntimeContext {
  const config = structuredClone(DEFAULT_CONFIG);
  config.agents.maxRetries = options.maxRetries ?? 2;
  config.agents.verbose = options.verbose ?? false;
  config.reflection.maxRevisions = options.maxRevisions ?? 1;
  return {
    config,
    provider: options.provider,
    logger: options.logger ?? createRecordingLogger(),
    traceSink: options.traceSink ?? new MemoryTraceSink(),
  };
}
