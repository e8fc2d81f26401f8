/**
 * Oracle providers. Nothing outside this directory talks to a model API.
 */

import type { LLMClient, LLMConfig } from './client.js';
import { createAnthropicClient } from './anthropic.js';
import { createOpenAIClient } from './openai.js';
import { createOllamaClient } from './ollama.js';
import { createMockClient } from './mock.js';

export * from './client.js';
export { createAnthropicClient, createOpenAIClient, createOllamaClient, createMockClient };
export type { MockLLMClient } from './mock.js';
export { RateLimitedError, withRateLimitRetry } from './retry.js';
export type { RetryOptions } from './retry.js';

const KEY_VARIABLES = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
} as const;

function requireKey(config: LLMConfig, provider: keyof typeof KEY_VARIABLES): string {
  if (config.apiKey === undefined) {
    throw new Error(`${KEY_VARIABLES[provider]} is required when using the ${provider} provider`);
  }
  return config.apiKey;
}

export function createLLMClient(config: LLMConfig): LLMClient {
  switch (config.provider) {
    case 'anthropic':
      return createAnthropicClient(requireKey(config, 'anthropic'), config.model);
    case 'openai':
      return createOpenAIClient(requireKey(config, 'openai'), config.model);
    case 'ollama':
      return createOllamaClient(config.baseUrl, config.model);
    case 'mock':
      return createMockClient();
  }
}
