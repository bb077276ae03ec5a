import { Hono, type Context } from 'hono';
import type { ZodType, ZodTypeDef } from 'zod';
import {
  articleRequestSchema,
  generateId,
  reflectRequestSchema,
  sanitizeRequestSchema,
  summarizeRequestSchema,
} from '@refract/shared';
import { reflectiveImprove, type RuntimeContext, type Workflows } from '@refract/core';

type Parsed<T> = { ok: true; data: T } | { ok: false; response: Response };

async function parseBody<T>(c: Context, schema: ZodType<T, ZodTypeDef, unknown>): Promise<Parsed<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return { ok: false, response: c.json({ error: 'Request body must be JSON' }, 400) };
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    return { ok: false, response: c.json({ error: 'Invalid request', issues: parsed.error.issues }, 400) };
  }
  return { ok: true, data: parsed.data };
}

export function tasksRoutes(context: RuntimeContext, workflows: Workflows) {
  const router = new Hono();

  router.post('/summarize', async (c) => {
    const req = await parseBody(c, summarizeRequestSchema);
    if (!req.ok) return req.response;
    const result = await workflows.summarizeWithValidation(req.data.text, { taskId: req.data.taskId });
    return c.json(result);
  });

  router.post('/article', async (c) => {
    const req = await parseBody(c, articleRequestSchema);
    if (!req.ok) return req.response;
    const { topic, outline, reflect, taskId } = req.data;
    const result = await workflows.writeAndRefineArticle(topic, outline, { taskId, reflect });
    return c.json(result);
  });

  router.post('/sanitize', async (c) => {
    const req = await parseBody(c, sanitizeRequestSchema);
    if (!req.ok) return req.response;
    const result = await workflows.sanitizeWithValidation(req.data.medicalData, { taskId: req.data.taskId });
    return c.json(result);
  });

  router.post('/reflect', async (c) => {
    const req = await parseBody(c, reflectRequestSchema);
    if (!req.ok) return req.response;
    const result = await reflectiveImprove(context, {
      taskId: req.data.taskId ?? generateId('reflect'),
      agentName: req.data.agentName,
      taskDescription: req.data.taskDescription,
      draft: req.data.draft,
      maxRevisions: req.data.maxRevisions,
    });
    return c.json(result);
  });

  return router;
}
