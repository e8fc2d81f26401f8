import Anthropic from '@anthropic-ai/sdk';

import type { LLMClient } from './client.js';
import { RateLimitedError, withRateLimitRetry } from './retry.js';

const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';
const MAX_TOKENS = 4096;

/**
 * Messages API through the SDK. The SDK's own retries are turned off so
 * rate limits go through the shared backoff like every other provider.
 */
export function createAnthropicClient(apiKey: string, model?: string): LLMClient {
  const sdk = new Anthropic({ apiKey, maxRetries: 0 });

  return {
    async generate(prompt) {
      const message = await withRateLimitRetry(async () => {
        try {
          return await sdk.messages.create({
            model: model ?? DEFAULT_MODEL,
            max_tokens: MAX_TOKENS,
            messages: [{ role: 'user', content: prompt }],
            temperature: 0,
          });
        } catch (err) {
          if (err instanceof Anthropic.RateLimitError) throw new RateLimitedError('Anthropic');
          throw err;
        }
      });

      const text = message.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('');
      if (text.length === 0) {
        throw new Error('Anthropic API returned no text content');
      }
      return text;
    },
  };
}
