import { z } from 'zod';

import type { CompletionPrompt, LLMClient } from './client.js';
import { restoreStopSequence } from './client.js';
import { TIMEOUTS, TOKEN_GUARDS } from '../config/defaults.js';
import * as log from '../utils/logger.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'gpt-4o-mini';
const COMPLETIONS_URL = 'https://api.openai.com/v1/chat/completions';

// ── Response validation ──────────────────────────────────────

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .nonempty(),
});

// ── Rate-limit-aware fetch ───────────────────────────────────

const MAX_RETRIES = 3;

async function fetchWithRetry(
  url: string,
  init: RequestInit,
): Promise<Response> {
  for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
    const response = await fetch(url, init);

    if (response.status === 429) {
      const retryAfter = response.headers.get('retry-after');
      const waitMs = retryAfter
        ? parseFloat(retryAfter) * 1000
        : (attempt + 1) * TIMEOUTS.RATE_LIMIT_BACKOFF;
      log.warn(`[llm] Rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`);
      await new Promise((r) => setTimeout(r, waitMs));
      continue;
    }

    if (!response.ok) {
      const body = await response.text();
      throw new Error(
        `OpenAI API error (${String(response.status)}): ${body}`,
      );
    }

    return response;
  }

  throw new Error('OpenAI API: max retries exceeded due to rate limiting');
}

// ── Provider factory ─────────────────────────────────────────

export function createOpenAIClient(
  apiKey: string,
  model?: string,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;

  return {
    async complete(prompt: CompletionPrompt): Promise<string> {
      const messages = [
        { role: 'system', content: prompt.system },
        { role: 'user', content: prompt.task },
      ];
      if (prompt.transcript.length > 0) {
        messages.push({ role: 'assistant', content: prompt.transcript });
      }

      const response = await fetchWithRetry(COMPLETIONS_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify({
          model: resolvedModel,
          messages,
          max_tokens: TOKEN_GUARDS.MAX_TOKENS,
          stop: prompt.stopSequences,
          temperature: 0,
        }),
      });

      const raw = await response.text();
      const body: unknown = JSON.parse(raw);
      const parsed = chatResponseSchema.parse(body);
      const choice = parsed.choices[0];

      // "stop" covers both a natural end and a hit stop sequence.
      const stoppedOn = choice.finish_reason === 'stop'
        ? prompt.stopSequences[0]
        : undefined;
      return restoreStopSequence(choice.message.content, stoppedOn);
    },
  };
}
