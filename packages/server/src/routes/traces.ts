import { Hono } from 'hono';
import { z } from 'zod';
import { listTraceFiles, readLatestSnapshot, readTraceSnapshots, type RuntimeContext } from '@refract/core';

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

export function tracesRoutes(context: RuntimeContext) {
  const router = new Hono();
  const dir = context.config.tracing.dir;

  // Recent trace files, newest first, with every snapshot's summary
  router.get('/', async (c) => {
    const query = listQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return c.json({ error: 'Invalid query', issues: query.error.issues }, 400);
    }

    const files = await listTraceFiles(dir, query.data.limit);
    const traces = [];
    for (const path of files) {
      const { exchanges, skipped } = await readTraceSnapshots(path);
      traces.push({
        path,
        skipped,
        snapshots: exchanges.map(e => ({
          taskId: e.taskId,
          verdict: e.verdict,
          latencyMs: e.latencyMs,
          costTokensPrompt: e.costTokensPrompt,
          costTokensOutput: e.costTokensOutput,
          messageCount: e.messages.length,
        })),
      });
    }
    return c.json({ traces });
  });

  router.get('/:taskId', async (c) => {
    const taskId = c.req.param('taskId');
    const exchange = await readLatestSnapshot(dir, taskId);
    if (!exchange) {
      return c.json({ error: `No trace found for task '${taskId}'` }, 404);
    }
    return c.json(exchange);
  });

  return router;
}
