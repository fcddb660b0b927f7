import type { CompletionPrompt, LLMClient } from './client.js';
import { encodeCall } from '../core/protocol.js';
import { DEFAULT_MARKERS } from '../config/defaults.js';

const DEFAULT_RESPONSE = encodeCall(
  { thought: 'Nothing left to do.', name: 'finish', arguments: { result: 'mock' } },
  DEFAULT_MARKERS,
);

export interface MockLLMClient extends LLMClient {
  /** Every prompt received, in call order. */
  readonly prompts: readonly CompletionPrompt[];
}

/**
 * Mock LLM provider for testing.
 * Cycles through provided canned responses, falling back to a `finish` call.
 */
export function createMockClient(
  responses?: readonly string[],
): MockLLMClient {
  let callIndex = 0;
  const prompts: CompletionPrompt[] = [];

  return {
    prompts,

    async complete(prompt: CompletionPrompt): Promise<string> {
      prompts.push(prompt);
      const response = responses?.[callIndex] ?? DEFAULT_RESPONSE;
      callIndex++;
      return response;
    },
  };
}
