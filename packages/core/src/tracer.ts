import { appendFileSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import {
  TraceWriteError,
  assertTaskId,
  cloneExchange,
  createExchange,
  elapsedMs,
  monotonicNow,
  ok,
  err,
  serializeExchange,
  silentLogger,
  type Exchange,
  type Logger,
  type Message,
  type Result,
  type Verdict,
} from '@refract/shared';

/** Where finalized exchanges go. One call appends exactly one line. */
export interface TraceSink {
  locate(taskId: string): string;
  /** Throws on I/O failure. */
  append(taskId: string, line: string): void;
}

export class FileTraceSink implements TraceSink {
  constructor(readonly dir: string) {}

  locate(taskId: string): string {
    assertTaskId(taskId);
    return join(this.dir, `${taskId}.jsonl`);
  }

  append(taskId: string, line: string): void {
    mkdirSync(this.dir, { recursive: true });
    // single write per line so concurrent finalizes never interleave
    appendFileSync(this.locate(taskId), `${line}\n`, 'utf-8');
  }
}

export class MemoryTraceSink implements TraceSink {
  private files = new Map<string, string[]>();

  locate(taskId: string): string {
    return `memory://${taskId}.jsonl`;
  }

  append(taskId: string, line: string): void {
    const lines = this.files.get(taskId) ?? [];
    lines.push(line);
    this.files.set(taskId, lines);
  }

  lines(taskId: string): string[] {
    return [...(this.files.get(taskId) ?? [])];
  }

  taskIds(): string[] {
    return [...this.files.keys()];
  }
}

export interface TracerOptions {
  sink: TraceSink;
  logger?: Logger;
}

export interface FinalizeOptions {
  verdict?: Verdict;
  promptTokens?: number;
  outputTokens?: number;
}

/**
 * Records one task's interaction history and persists it on `finalize`.
 *
 * Messages are kept in insertion order. Token totals only grow. Latency is
 * stamped by the first finalize and kept afterwards; each finalize appends a
 * full snapshot, so the last line of a task's file is its latest state.
 */
export class Tracer {
  readonly taskId: string;

  private exchange: Exchange;
  private readonly startedAt: number;
  private readonly sink: TraceSink;
  private readonly logger: Logger;

  constructor(taskId: string, options: TracerOptions) {
    assertTaskId(taskId);
    this.taskId = taskId;
    this.exchange = createExchange(taskId);
    this.startedAt = monotonicNow();
    this.sink = options.sink;
    this.logger = options.logger ?? silentLogger;
  }

  log(message: Message): void {
    this.exchange.messages.push(message);
  }

  finalize(options: FinalizeOptions = {}): Result<{ path: string }, TraceWriteError> {
    if (this.exchange.latencyMs === null) {
      this.exchange.latencyMs = elapsedMs(this.startedAt);
    }

    this.exchange.costTokensPrompt += this.tokenCount('prompt', options.promptTokens);
    this.exchange.costTokensOutput += this.tokenCount('output', options.outputTokens);

    if (options.verdict !== undefined) {
      this.exchange.verdict = options.verdict;
    }

    const path = this.sink.locate(this.taskId);
    try {
      this.sink.append(this.taskId, serializeExchange(this.exchange));
      return ok({ path });
    } catch (e) {
      const error = new TraceWriteError(path, e);
      this.logger.error(`[tracer] ${error.message}`);
      return err(error);
    }
  }

  snapshot(): Exchange {
    return cloneExchange(this.exchange);
  }

  private tokenCount(kind: 'prompt' | 'output', value: number | undefined): number {
    if (value === undefined) return 0;
    if (!Number.isFinite(value) || value < 0) {
      this.logger.warn(`[tracer] Ignoring invalid ${kind} token count ${value} for task ${this.taskId}`);
      return 0;
    }
    return Math.floor(value);
  }
}
