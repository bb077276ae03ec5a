import {
  AgentExhaustedError,
  ConfigError,
  describeError,
  err,
  ok,
  silentLogger,
  type ChatMessage,
  type GenerateParams,
  type Logger,
  type Result,
  type TokenUsage,
} from '@refract/shared';
import type { ModelProvider } from '@refract/models';

export interface AgentCall {
  agentName: string;
  messages: ChatMessage[];
  params?: GenerateParams;
}

export interface ExecutionOptions {
  provider: ModelProvider;
  /** Total attempts, including the first */
  maxRetries: number;
  verbose?: boolean;
  logger?: Logger;
}

export interface AgentReply {
  text: string;
  usage: TokenUsage;
  attempts: number;
}

const PREVIEW_LENGTH = 120;

/**
 * Calls the model for one agent, retrying immediately on any provider failure.
 * Each invocation has its own attempt budget.
 */
export async function executeWithRetry(call: AgentCall, options: ExecutionOptions): Promise<AgentReply> {
  const { provider, maxRetries } = options;
  const logger = options.logger ?? silentLogger;
  const name = call.agentName;

  if (!Number.isInteger(maxRetries) || maxRetries < 1) {
    throw new ConfigError(`maxRetries must be a positive integer, got ${maxRetries}`);
  }

  if (options.verbose) {
    logger.debug(`[${name}] Sending ${call.messages.length} messages to model:`);
    for (const message of call.messages) {
      logger.debug(`  ${message.role}: ${preview(message.content)}...`);
    }
  }

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      const reply = await provider.generate(call.messages, call.params);
      logger.info(
        options.verbose
          ? `[${name}] Received response (first ${PREVIEW_LENGTH} chars): ${preview(reply.text)}`
          : `[${name}] Received response after ${attempt} attempt(s)`,
      );
      return { text: reply.text, usage: reply.usage, attempts: attempt };
    } catch (e) {
      lastError = e;
      logger.error(`[${name}] Error during model call: ${describeError(e)}. Retry ${attempt}/${maxRetries}`);
    }
  }

  throw new AgentExhaustedError(name, maxRetries, lastError);
}

export async function tryExecuteWithRetry(
  call: AgentCall,
  options: ExecutionOptions,
): Promise<Result<AgentReply, AgentExhaustedError>> {
  try {
    return ok(await executeWithRetry(call, options));
  } catch (e) {
    if (e instanceof AgentExhaustedError) return err(e);
    throw e;
  }
}

function preview(text: string): string {
  return text.slice(0, PREVIEW_LENGTH).replace(/\n/g, ' ');
}
