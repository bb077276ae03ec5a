import { z } from 'zod';
import { messageRecordSchema } from './message.schema.js';

/** Task ids name trace files, so they must stay a single path segment. */
export const taskIdSchema = z
  .string()
  .min(1, 'task id must be non-empty')
  .regex(/^[A-Za-z0-9._-]+$/, 'task id may only contain letters, digits, ".", "_" and "-"')
  .refine(id => id !== '.' && id !== '..', 'task id must not be "." or ".."');

export const exchangeRecordSchema = z.object({
  task_id: taskIdSchema,
  messages: z.array(messageRecordSchema),
  cost_tokens_prompt: z.number().int().nonnegative(),
  cost_tokens_output: z.number().int().nonnegative(),
  latency_ms: z.number().int().nonnegative().nullable(),
  verdict: z.string().nullable(),
});
