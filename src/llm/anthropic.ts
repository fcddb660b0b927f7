import Anthropic from '@anthropic-ai/sdk';

import type { CompletionPrompt, LLMClient } from './client.js';
import { restoreStopSequence } from './client.js';
import { TIMEOUTS, TOKEN_GUARDS } from '../config/defaults.js';
import * as log from '../utils/logger.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';
const MAX_RETRIES = 3;

// ── Rate-limit-aware wrapper ────────────────────────────────

function isRateLimitError(err: unknown): boolean {
  if (err instanceof Anthropic.RateLimitError) return true;
  if (err instanceof Error && err.message.includes('429')) return true;
  return false;
}

async function withRetry<T>(fn: () => Promise<T>): Promise<T> {
  for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isRateLimitError(err) || attempt === MAX_RETRIES - 1) throw err;

      const waitMs = (attempt + 1) * TIMEOUTS.RATE_LIMIT_BACKOFF;
      log.warn(`[llm] Rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`);
      await new Promise((r) => setTimeout(r, waitMs));
    }
  }

  throw new Error('Anthropic API: max retries exceeded due to rate limiting');
}

// ── Provider factory ─────────────────────────────────────────

export function createAnthropicClient(
  apiKey: string,
  model?: string,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;
  const client = new Anthropic({ apiKey });

  return {
    async complete(prompt: CompletionPrompt): Promise<string> {
      // Assistant prefill may not end in whitespace, so the transcript
      // travels in the user turn after the task.
      const userContent = prompt.transcript.length > 0
        ? `${prompt.task}\n${prompt.transcript}`
        : prompt.task;

      const response = await withRetry(() =>
        client.messages.create({
          model: resolvedModel,
          max_tokens: TOKEN_GUARDS.MAX_TOKENS,
          system: prompt.system,
          messages: [{ role: 'user', content: userContent }],
          stop_sequences: [...prompt.stopSequences],
          temperature: 0,
        }),
      );

      const firstBlock = response.content[0];
      if (!firstBlock || firstBlock.type !== 'text') {
        throw new Error('Anthropic API returned no text content');
      }

      const stoppedOn = response.stop_reason === 'stop_sequence'
        ? response.stop_sequence ?? undefined
        : undefined;
      return restoreStopSequence(firstBlock.text, stoppedOn);
    },
  };
}
