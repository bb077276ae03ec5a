import { z } from 'zod';
import { MESSAGE_ROLES } from '../types/message.js';

export const messageRoleSchema = z.enum(MESSAGE_ROLES);

export const messageInputSchema = z
  .object({
    role: messageRoleSchema,
    sender: z.string(),
    content: z.string(),
    toolName: z.string().min(1).optional(),
    toolArgs: z.record(z.unknown()).optional(),
  })
  .refine(
    m => m.role === 'tool' || (m.toolName === undefined && m.toolArgs === undefined),
    { message: 'toolName and toolArgs are only allowed on tool messages', path: ['role'] },
  );

// Older writers emitted explicit nulls for the tool fields
export const messageRecordSchema = z.object({
  id: z.string().min(1),
  role: messageRoleSchema,
  sender: z.string(),
  content: z.string(),
  tool_name: z.string().nullish(),
  tool_args: z.record(z.unknown()).nullish(),
  ts: z.string(),
});
