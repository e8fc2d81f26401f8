import type { LLMClient } from './client.js';

const DEFAULT_RESPONSE = '1';

export interface MockLLMClient extends LLMClient {
  /** Every prompt received, in call order. */
  readonly prompts: readonly string[];
}

/**
 * Mock LLM provider for testing and offline runs.
 * Replays the canned responses in order, falling back to a default.
 */
export function createMockClient(
  responses?: readonly string[],
): MockLLMClient {
  const prompts: string[] = [];

  return {
    prompts,
    async generate(prompt: string): Promise<string> {
      const response = responses?.[prompts.length] ?? DEFAULT_RESPONSE;
      prompts.push(prompt);
      return response;
    },
  };
}
