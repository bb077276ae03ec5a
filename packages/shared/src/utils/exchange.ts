import type { ZodError } from 'zod';
import type { Message, MessageInput } from '../types/message.js';
import type { Exchange, ExchangeRecord, MessageRecord } from '../types/exchange.js';
import { messageInputSchema } from '../schemas/message.schema.js';
import { exchangeRecordSchema, taskIdSchema } from '../schemas/exchange.schema.js';
import { generateId } from './id.js';
import { isoNow } from './clock.js';
import { ValidationError, describeError } from './errors.js';

export function createMessage(input: MessageInput): Message {
  const parsed = messageInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(`Invalid message: ${formatIssues(parsed.error)}`);
  }

  const message: Message = {
    id: generateId('msg'),
    role: parsed.data.role,
    sender: parsed.data.sender,
    content: parsed.data.content,
    ts: isoNow(),
  };
  if (parsed.data.toolName !== undefined) message.toolName = parsed.data.toolName;
  if (parsed.data.toolArgs !== undefined) message.toolArgs = parsed.data.toolArgs;
  return message;
}

export function createExchange(taskId: string): Exchange {
  assertTaskId(taskId);
  return {
    taskId,
    messages: [],
    costTokensPrompt: 0,
    costTokensOutput: 0,
    latencyMs: null,
    verdict: null,
  };
}

export function assertTaskId(taskId: string): void {
  const parsed = taskIdSchema.safeParse(taskId);
  if (!parsed.success) {
    throw new ValidationError(`Invalid task id: ${formatIssues(parsed.error)}`);
  }
}

/** One JSON line, without the trailing newline. */
export function serializeExchange(exchange: Exchange): string {
  return JSON.stringify(toExchangeRecord(exchange));
}

export function parseExchangeRecord(line: string): Exchange {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (e) {
    throw new ValidationError(`Trace line is not valid JSON: ${describeError(e)}`);
  }

  const parsed = exchangeRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid trace record: ${formatIssues(parsed.error)}`);
  }

  const record = parsed.data;
  return {
    taskId: record.task_id,
    messages: record.messages.map(m => {
      const message: Message = {
        id: m.id,
        role: m.role,
        sender: m.sender,
        content: m.content,
        ts: m.ts,
      };
      if (m.tool_name != null) message.toolName = m.tool_name;
      if (m.tool_args != null) message.toolArgs = m.tool_args;
      return message;
    }),
    costTokensPrompt: record.cost_tokens_prompt,
    costTokensOutput: record.cost_tokens_output,
    latencyMs: record.latency_ms,
    verdict: record.verdict,
  };
}

export function cloneExchange(exchange: Exchange): Exchange {
  return structuredClone(exchange);
}

function toExchangeRecord(exchange: Exchange): ExchangeRecord {
  return {
    task_id: exchange.taskId,
    messages: exchange.messages.map(toMessageRecord),
    cost_tokens_prompt: exchange.costTokensPrompt,
    cost_tokens_output: exchange.costTokensOutput,
    latency_ms: exchange.latencyMs,
    verdict: exchange.verdict,
  };
}

function toMessageRecord(message: Message): MessageRecord {
  return {
    id: message.id,
    role: message.role,
    sender: message.sender,
    content: message.content,
    ...(message.toolName !== undefined ? { tool_name: message.toolName } : {}),
    ...(message.toolArgs !== undefined ? { tool_args: message.toolArgs } : {}),
    ts: message.ts,
  };
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join(', ');
}
