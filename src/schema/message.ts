import { z } from 'zod';

// ── Role ────────────────────────────────────────────────────

export const messageRoleSchema = z.enum(['system', 'user', 'assistant', 'tool']);

export type MessageRole = z.infer<typeof messageRoleSchema>;

// ── Message ─────────────────────────────────────────────────

export const messageSchema = z.object({
  id: z.number().int().nonnegative(),
  role: messageRoleSchema,
  content: z.string(),
  timestamp: z.string().datetime(),
});

export type Message = z.infer<typeof messageSchema>;
