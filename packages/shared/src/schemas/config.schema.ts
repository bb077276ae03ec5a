import { z } from 'zod';

export const modelProviderNameSchema = z.enum(['openai', 'ollama']);

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const openaiConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).default('gpt-4o'),
  baseUrl: z.string().url().optional(),
});

const ollamaConfigSchema = z.object({
  baseUrl: z.string().url().default('http://localhost:11434'),
  model: z.string().min(1).default('llama3:8b'),
});

export const providersConfigSchema = z.object({
  openai: openaiConfigSchema.default({}),
  ollama: ollamaConfigSchema.default({}),
});

export const agentsConfigSchema = z.object({
  maxRetries: z.number().int().min(1).max(10).default(2),
  verbose: z.boolean().default(true),
});

export const reflectionConfigSchema = z.object({
  maxRevisions: z.number().int().min(0).max(10).default(1),
});

export const tracingConfigSchema = z.object({
  dir: z.string().min(1).default('traces'),
});

export const loggingConfigSchema = z.object({
  level: logLevelSchema.default('info'),
});

export const serverConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(3928),
  host: z.string().default('127.0.0.1'),
});

export const refractConfigSchema = z.object({
  provider: modelProviderNameSchema.default('openai'),
  providers: providersConfigSchema.default({}),
  agents: agentsConfigSchema.default({}),
  reflection: reflectionConfigSchema.default({}),
  tracing: tracingConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
  server: serverConfigSchema.default({}),
});
