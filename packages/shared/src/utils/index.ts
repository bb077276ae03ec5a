export { generateId } from './id.js';
export { monotonicNow, elapsedMs, isoNow } from './clock.js';
export { ok, err } from './result.js';
export type { Result } from './result.js';
export {
  RefractError,
  AgentExhaustedError,
  TraceWriteError,
  ConfigError,
  AgentNotFoundError,
  ValidationError,
  ProviderError,
  describeError,
} from './errors.js';
export type { ErrorKind } from './errors.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
export {
  createMessage,
  createExchange,
  assertTaskId,
  serializeExchange,
  parseExchangeRecord,
  cloneExchange,
} from './exchange.js';
