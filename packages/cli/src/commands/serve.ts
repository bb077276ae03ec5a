import { Command } from 'commander';
import { createCliRuntime } from '../setup.js';
import { parseInteger } from './input.js';

export const serveCommand = new Command('serve')
  .description('Start the Refract HTTP API server')
  .option('-p, --port <port>', 'Server port', parseInteger)
  .option('-H, --host <host>', 'Server host')
  .action(async (options: { port?: number; host?: string }, command: Command) => {
    // Dynamic import to avoid loading server deps in CLI-only mode
    const { startServer } = await import('@refract/server');

    const { context } = await createCliRuntime(command, {
      server: {
        ...(options.port !== undefined ? { port: options.port } : {}),
        ...(options.host !== undefined ? { host: options.host } : {}),
      },
    });

    startServer(context);
  });
