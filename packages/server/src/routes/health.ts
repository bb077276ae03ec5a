import { Hono } from 'hono';
import type { RuntimeContext } from '@refract/core';

export function healthRoutes(context: RuntimeContext) {
  const router = new Hono();

  router.get('/', async (c) => {
    return c.json({
      status: 'ok',
      version: '0.1.0',
      provider: {
        name: context.provider.name,
        model: context.provider.model,
        available: await context.provider.isAvailable(),
      },
      config: {
        maxRetries: context.config.agents.maxRetries,
        maxRevisions: context.config.reflection.maxRevisions,
        traceDir: context.config.tracing.dir,
      },
    });
  });

  return router;
}
