import { z } from 'zod';

import { messageSchema } from './message.js';

// ── Termination ─────────────────────────────────────────────

export const terminationReasonSchema = z.enum(['finish', 'budget']);

export type TerminationReason = z.infer<typeof terminationReasonSchema>;

// ── RunSummary ────────────────────────────────────────────────

export const runSummarySchema = z.object({
  runId: z.string().min(1),
  task: z.string(),
  result: z.string(),
  terminatedBy: terminationReasonSchema,
  steps: z.number().int().nonnegative(),
  stepBudget: z.number().int().nonnegative(),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
  messages: z.array(messageSchema),
});

export type RunSummary = z.infer<typeof runSummarySchema>;

// ── Exit code decision ───────────────────────────────────────

export function exitCodeFor(reason: TerminationReason): number {
  return reason === 'finish' ? 0 : 2;
}

// ── Validators ────────────────────────────────────────────────

export function parseRunSummary(data: unknown): RunSummary {
  return runSummarySchema.parse(data);
}
