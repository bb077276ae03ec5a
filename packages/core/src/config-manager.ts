import { readFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import {
  type RefractConfig,
  refractConfigSchema,
  ConfigError,
  describeError,
} from '@refract/shared';

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export interface LoadOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export const CONFIG_FILE_NAMES = ['refract.config.yaml', 'refract.config.yml', 'refract.config.json'];

export class ConfigManager {
  private config: RefractConfig = validate({});
  private source?: string;

  async load(options: LoadOptions = {}): Promise<RefractConfig> {
    // 1. Defaults come from the schema
    let merged: Record<string, unknown> = {};

    // 2. Config file
    const file = await this.loadConfigFile(options.configPath, options.cwd);
    if (file) {
      merged = deepMerge(merged, file.data);
      this.source = file.path;
    }

    // 3. Environment variables
    merged = deepMerge(merged, loadEnvVars(options.env ?? process.env));

    // 4. Validate
    this.config = validate(merged);
    return this.config;
  }

  get<K extends keyof RefractConfig>(key: K): RefractConfig[K] {
    return this.config[key];
  }

  getAll(): RefractConfig {
    return this.config;
  }

  /** Path of the config file that was loaded, if any. */
  getSource(): string | undefined {
    return this.source;
  }

  set(overrides: DeepPartial<RefractConfig>): void {
    this.config = validate(deepMerge(toRecord(structuredClone(this.config)), toRecord(overrides)));
  }

  private async loadConfigFile(
    configPath: string | undefined,
    cwd: string = process.cwd(),
  ): Promise<{ path: string; data: Record<string, unknown> } | null> {
    if (configPath) {
      const p = resolve(cwd, configPath);
      if (!existsSync(p)) {
        throw new ConfigError(`config file not found: ${p}`);
      }
      return { path: p, data: await parseConfigFile(p) };
    }

    // Search cwd and parent directories
    let dir = resolve(cwd);
    for (let depth = 0; depth < 10; depth++) {
      for (const name of CONFIG_FILE_NAMES) {
        const p = resolve(dir, name);
        if (existsSync(p)) {
          return { path: p, data: await parseConfigFile(p) };
        }
      }
      const parent = dirname(dir);
      if (parent === dir) break; // reached filesystem root
      dir = parent;
    }

    return null;
  }
}

async function parseConfigFile(p: string): Promise<Record<string, unknown>> {
  const content = await readFile(p, 'utf-8');
  let data: unknown;
  try {
    data = p.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (e) {
    throw new ConfigError(`cannot parse ${p}: ${describeError(e)}`);
  }
  if (data === null || data === undefined) return {};
  if (!isRecord(data)) {
    throw new ConfigError(`${p} must contain a mapping at the top level`);
  }
  return data;
}

function loadEnvVars(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const config: Record<string, unknown> = {};
  const openai: Record<string, unknown> = {};
  const ollama: Record<string, unknown> = {};

  if (env.USE_OLLAMA !== undefined && env.USE_OLLAMA !== '') {
    config.provider = env.USE_OLLAMA.toLowerCase() === 'true' ? 'ollama' : 'openai';
  }

  if (env.OPENAI_API_KEY) openai.apiKey = env.OPENAI_API_KEY;
  if (env.OPENAI_MODEL) openai.model = env.OPENAI_MODEL;
  if (env.OLLAMA_MODEL) ollama.model = env.OLLAMA_MODEL;
  if (env.OLLAMA_BASE_URL) ollama.baseUrl = env.OLLAMA_BASE_URL;
  if (Object.keys(openai).length > 0 || Object.keys(ollama).length > 0) {
    config.providers = { openai, ollama };
  }

  if (env.TRACE_DIR) {
    config.tracing = { dir: env.TRACE_DIR };
  }

  if (env.REFRACT_MAX_RETRIES) {
    config.agents = { maxRetries: Number(env.REFRACT_MAX_RETRIES) };
  }

  if (env.REFRACT_MAX_REVISIONS) {
    config.reflection = { maxRevisions: Number(env.REFRACT_MAX_REVISIONS) };
  }

  if (env.REFRACT_LOG_LEVEL) {
    config.logging = { level: env.REFRACT_LOG_LEVEL };
  }

  if (env.REFRACT_SERVER_PORT) {
    config.server = { port: Number(env.REFRACT_SERVER_PORT) };
  }

  return config;
}

function validate(raw: Record<string, unknown>): RefractConfig {
  const result = refractConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', '),
    );
  }
  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const incoming = source[key];
    const existing = target[key];
    if (incoming === undefined) continue;
    if (isRecord(incoming) && isRecord(existing)) {
      result[key] = deepMerge(existing, incoming);
    } else {
      result[key] = incoming;
    }
  }
  return result;
}
