import { createLogger, type Logger, type RefractConfig } from '@refract/shared';
import { createProvider, type ModelProvider } from '@refract/models';
import { FileTraceSink, type TraceSink } from './tracer.js';

/** Everything a task needs, created once at startup and passed down explicitly. */
export interface RuntimeContext {
  config: RefractConfig;
  logger: Logger;
  provider: ModelProvider;
  traceSink: TraceSink;
}

export type RuntimeOverrides = Partial<Pick<RuntimeContext, 'logger' | 'provider' | 'traceSink'>>;

export function createRuntime(config: RefractConfig, overrides: RuntimeOverrides = {}): RuntimeContext {
  return {
    config,
    logger: overrides.logger ?? createLogger({ level: config.logging.level }),
    provider: overrides.provider ?? createProvider(config),
    traceSink: overrides.traceSink ?? new FileTraceSink(config.tracing.dir),
  };
}
