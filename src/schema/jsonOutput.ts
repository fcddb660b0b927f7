import { z } from 'zod';

import { messageRoleSchema } from './message.js';
import { terminationReasonSchema } from './results.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Message output ──────────────────────────────────────────

export const jsonOutputMessageSchema = z.object({
  id: z.number().int().nonnegative(),
  role: messageRoleSchema,
  content: z.string(),
});

export type JsonOutputMessage = z.infer<typeof jsonOutputMessageSchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  runId: z.string().min(1),
  task: z.string(),
  result: z.string(),
  terminatedBy: terminationReasonSchema,
  steps: z.number().int().nonnegative(),
  stepBudget: z.number().int().nonnegative(),
  durationMs: z.number().int().nonnegative(),
  exitCode: z.number().int().nonnegative(),
  messages: z.array(jsonOutputMessageSchema),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
