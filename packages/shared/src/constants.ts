import type { RefractConfig } from './types/config.js';

export const DEFAULT_TRACE_DIR = 'traces';

export const DEFAULT_CONFIG: RefractConfig = {
  provider: 'openai',
  providers: {
    openai: {
      model: 'gpt-4o',
    },
    ollama: {
      baseUrl: 'http://localhost:11434',
      model: 'llama3:8b',
    },
  },
  agents: {
    maxRetries: 2,
    verbose: true,
  },
  reflection: {
    maxRevisions: 1,
  },
  tracing: {
    dir: DEFAULT_TRACE_DIR,
  },
  logging: {
    level: 'info',
  },
  server: {
    port: 3928,
    host: '127.0.0.1',
  },
};
