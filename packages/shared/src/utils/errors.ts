export type ErrorKind = 'agent_exhausted' | 'trace_io' | 'caller_config' | 'provider';

export class RefractError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string) {
    super(message);
    this.name = 'RefractError';
    this.kind = kind;
  }
}

/** Every attempt of an agent's model call failed. Always propagated to the caller. */
export class AgentExhaustedError extends RefractError {
  constructor(
    public readonly agentName: string,
    public readonly attempts: number,
    public readonly lastError?: unknown,
  ) {
    super('agent_exhausted', `[${agentName}] Failed to get response after ${attempts} attempts`);
    this.name = 'AgentExhaustedError';
  }
}

/** A trace line could not be written. Non-fatal: returned, never thrown by the tracer. */
export class TraceWriteError extends RefractError {
  constructor(
    public readonly path: string,
    public readonly cause: unknown,
  ) {
    super('trace_io', `Failed to write trace file ${path}: ${describeError(cause)}`);
    this.name = 'TraceWriteError';
  }
}

export class ConfigError extends RefractError {
  constructor(message: string) {
    super('caller_config', `Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}

export class AgentNotFoundError extends RefractError {
  constructor(public readonly agentName: string) {
    super('caller_config', `Agent '${agentName}' not found.`);
    this.name = 'AgentNotFoundError';
  }
}

export class ValidationError extends RefractError {
  constructor(message: string) {
    super('caller_config', message);
    this.name = 'ValidationError';
  }
}

export class ProviderError extends RefractError {
  constructor(
    public readonly providerName: string,
    message: string,
    public readonly cause?: unknown,
  ) {
    super('provider', `${providerName}: ${message}`);
    this.name = 'ProviderError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
