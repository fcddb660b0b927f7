import { z } from 'zod';

// ── LLMClient interface ──────────────────────────────────────

export interface CompletionPrompt {
  /** Instructions, tool catalog and response format. */
  system: string;
  task: string;
  /** Everything that happened so far, oldest first. May be empty. */
  transcript: string;
  stopSequences: readonly string[];
}

export interface LLMClient {
  complete(prompt: CompletionPrompt): Promise<string>;
}

// ── Config schema ────────────────────────────────────────────

export const llmProviderSchema = z.enum(['anthropic', 'openai', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

// ── Env loader ───────────────────────────────────────────────

export function loadLLMConfig(env: NodeJS.ProcessEnv = process.env): LLMConfig {
  const provider = env['LLM_PROVIDER'] ?? 'anthropic';

  const apiKey = provider === 'anthropic'
    ? env['ANTHROPIC_API_KEY']
    : env['OPENAI_API_KEY'];

  const model = provider === 'anthropic'
    ? env['STEPLOOP_MODEL']
    : env['LLM_MODEL'];

  return llmConfigSchema.parse({
    provider,
    apiKey,
    model,
  });
}

// ── Stop-sequence restoration ────────────────────────────────
// Providers cut the output right before the stop sequence; the decoder
// needs the END marker back to find the call block.

export function restoreStopSequence(text: string, stopSequence: string | undefined): string {
  if (stopSequence === undefined || text.endsWith(stopSequence)) return text;
  return `${text}\n${stopSequence}`;
}
