import type { ModelProviderName } from './model.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface OpenAIConfig {
  apiKey?: string;
  model: string;
  baseUrl?: string;
}

export interface OllamaConfig {
  baseUrl: string;
  model: string;
}

export interface AgentsConfig {
  /** Total attempts per model call, must be >= 1 */
  maxRetries: number;
  verbose: boolean;
}

export interface ReflectionConfig {
  /** 0 means a single critique/revise cycle */
  maxRevisions: number;
}

export interface TracingConfig {
  dir: string;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface ServerConfig {
  port: number;
  host: string;
}

export interface RefractConfig {
  provider: ModelProviderName;
  providers: {
    openai: OpenAIConfig;
    ollama: OllamaConfig;
  };
  agents: AgentsConfig;
  reflection: ReflectionConfig;
  tracing: TracingConfig;
  logging: LoggingConfig;
  server: ServerConfig;
}
