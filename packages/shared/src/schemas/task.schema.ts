import { z } from 'zod';
import { taskIdSchema } from './exchange.schema.js';

export const summarizeRequestSchema = z.object({
  taskId: taskIdSchema.optional(),
  text: z.string().min(1).max(100_000),
});

export const articleRequestSchema = z.object({
  taskId: taskIdSchema.optional(),
  topic: z.string().min(1).max(1_000),
  outline: z.string().max(10_000).optional(),
  reflect: z.boolean().default(false),
});

export const sanitizeRequestSchema = z.object({
  taskId: taskIdSchema.optional(),
  medicalData: z.string().min(1).max(100_000),
});

export const reflectRequestSchema = z.object({
  taskId: taskIdSchema.optional(),
  agentName: z.string().min(1),
  taskDescription: z.string().min(1),
  draft: z.string().min(1),
  maxRevisions: z.number().int().min(0).max(10).optional(),
});
