import { z } from 'zod';

import { LIMITS, TIMEOUTS } from '../config/defaults.js';

// ── Marker overrides ────────────────────────────────────────

export const markerOverridesSchema = z.object({
  begin: z.string().min(1).optional(),
  end: z.string().min(1).optional(),
  arg: z.string().min(1).optional(),
  value: z.string().min(1).optional(),
});

export type MarkerOverrides = z.infer<typeof markerOverridesSchema>;

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  provider: z.enum(['anthropic', 'openai', 'mock']).optional(),
  model: z.string().min(1).optional(),
  maxSteps: z.number().int().positive().optional().default(LIMITS.DEFAULT_MAX_STEPS),
  workdir: z.string().min(1).optional(),
  // Seconds, like the CLI flag.
  commandTimeout: z
    .number()
    .positive()
    .optional()
    .default(TIMEOUTS.COMMAND_TIMEOUT / 1000),
  instructions: z.string().min(1).optional(),
  requireChanges: z.boolean().optional().default(false),
  patch: z.boolean().optional().default(false),
  reportPath: z.string().min(1).optional(),
  markers: markerOverridesSchema.optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
