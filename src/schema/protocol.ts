import { z } from 'zod';

// ── Markers ─────────────────────────────────────────────────
// Substring matching means no marker may contain another one:
// `----ARG----` inside `----ARG----X` would match both.

const markerFields = ['begin', 'end', 'arg', 'value'] as const;

export const protocolMarkersSchema = z
  .object({
    begin: z.string().min(1),
    end: z.string().min(1),
    arg: z.string().min(1),
    value: z.string().min(1),
  })
  .superRefine((markers, ctx) => {
    for (const outer of markerFields) {
      for (const inner of markerFields) {
        if (outer === inner) continue;
        if (markers[outer].includes(markers[inner])) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [outer],
            message: `marker "${outer}" must not contain marker "${inner}"`,
          });
        }
      }
    }
  });

export type ProtocolMarkers = z.infer<typeof protocolMarkersSchema>;

// ── Decoded call ────────────────────────────────────────────

export interface ParsedCall {
  thought: string;
  name: string;
  arguments: Record<string, string>;
}
