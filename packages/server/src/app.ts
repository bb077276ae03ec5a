import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { RefractError } from '@refract/shared';
import { AgentManager, Workflows, type RuntimeContext } from '@refract/core';
import { tasksRoutes } from './routes/tasks.js';
import { tracesRoutes } from './routes/traces.js';
import { healthRoutes } from './routes/health.js';

export type ErrorStatus = 400 | 500 | 502;

/** Agent exhaustion is an upstream failure; anything the caller got wrong is a 400. */
export function statusForError(err: unknown): ErrorStatus {
  if (!(err instanceof RefractError)) return 500;
  switch (err.kind) {
    case 'agent_exhausted':
    case 'provider':
      return 502;
    case 'caller_config':
      return 400;
    case 'trace_io':
      return 500;
  }
}

export function createApp(context: RuntimeContext) {
  const app = new Hono();
  const agents = new AgentManager(context);
  const workflows = new Workflows(context, agents);

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const ms = Date.now() - start;
    context.logger.info(`${c.req.method} ${c.req.path} ${c.res.status} ${ms}ms`);
  });

  // Error handling
  app.onError((err, c) => {
    const status = statusForError(err);
    if (status === 500) {
      context.logger.error(`Server error: ${err.stack ?? err.message}`);
      return c.json({ error: 'Internal server error' }, 500);
    }
    const body = err instanceof RefractError ? { error: err.message, kind: err.kind } : { error: err.message };
    return c.json(body, status);
  });

  // Routes
  app.route('/tasks', tasksRoutes(context, workflows));
  app.route('/traces', tracesRoutes(context));
  app.route('/health', healthRoutes(context));

  return app;
}

export function startServer(context: RuntimeContext) {
  const { port, host } = context.config.server;
  const app = createApp(context);

  context.logger.info('Starting Refract server...');
  return serve({ fetch: app.fetch, port, hostname: host }, () => {
    console.log(`Refract server listening on http://${host}:${port}`);
    console.log('');
    console.log('Endpoints:');
    console.log('  POST   /tasks/summarize  - Summarize medical text and validate');
    console.log('  POST   /tasks/article    - Write, refine and validate an article');
    console.log('  POST   /tasks/sanitize   - Remove PHI and validate');
    console.log('  POST   /tasks/reflect    - Critique and revise a draft');
    console.log('  GET    /traces           - Recent trace files');
    console.log('  GET    /traces/:taskId   - Latest trace of a task');
    console.log('  GET    /health           - Health check');
  });
}
