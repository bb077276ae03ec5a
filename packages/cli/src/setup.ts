import type { Command } from 'commander';
import { z } from 'zod';
import { ValidationError, logLevelSchema, type RefractConfig } from '@refract/shared';
import {
  AgentManager,
  ConfigManager,
  Workflows,
  createRuntime,
  type DeepPartial,
  type RuntimeContext,
} from '@refract/core';

export const globalOptionsSchema = z.object({
  config: z.string().optional(),
  ollama: z.boolean().optional(),
  traceDir: z.string().optional(),
  logLevel: logLevelSchema.optional(),
  quiet: z.boolean().optional(),
});

export type GlobalOptions = z.infer<typeof globalOptionsSchema>;

export interface CliRuntime {
  config: RefractConfig;
  context: RuntimeContext;
  agents: AgentManager;
  workflows: Workflows;
}

/** Global flags declared on the root program, as seen from any subcommand. */
export function globalOptions(command: Command): GlobalOptions {
  const parsed = globalOptionsSchema.safeParse(command.optsWithGlobals());
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid options: ${parsed.error.issues.map(i => `--${i.path.join('.')}: ${i.message}`).join(', ')}`,
    );
  }
  return parsed.data;
}

export async function loadCliConfig(options: GlobalOptions, overrides: DeepPartial<RefractConfig> = {}): Promise<ConfigManager> {
  const manager = new ConfigManager();
  await manager.load({ configPath: options.config });

  if (options.ollama) manager.set({ provider: 'ollama' });
  if (options.traceDir) manager.set({ tracing: { dir: options.traceDir } });
  if (options.logLevel) manager.set({ logging: { level: options.logLevel } });
  if (options.quiet) manager.set({ agents: { verbose: false } });
  manager.set(overrides);

  return manager;
}

export async function createCliRuntime(command: Command, overrides: DeepPartial<RefractConfig> = {}): Promise<CliRuntime> {
  const manager = await loadCliConfig(globalOptions(command), overrides);
  const config = manager.getAll();
  const context = createRuntime(config);
  const agents = new AgentManager(context);
  return { config, context, agents, workflows: new Workflows(context, agents) };
}
