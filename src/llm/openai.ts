import { z } from 'zod';

import type { LLMClient } from './client.js';
import { RateLimitedError, withRateLimitRetry } from './retry.js';

const DEFAULT_MODEL = 'gpt-4o-mini';
const COMPLETIONS_URL = 'https://api.openai.com/v1/chat/completions';

const completionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string() }) }))
    .nonempty(),
});

function retryAfterMs(response: Response): number | undefined {
  const header = response.headers.get('retry-after');
  const seconds = header === null ? NaN : Number.parseFloat(header);
  return Number.isFinite(seconds) ? seconds * 1000 : undefined;
}

/** Chat Completions over plain fetch. Each prompt is a single user message. */
export function createOpenAIClient(apiKey: string, model?: string): LLMClient {
  const request = (prompt: string): RequestInit => ({
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${apiKey}`,
    },
    body: JSON.stringify({
      model: model ?? DEFAULT_MODEL,
      messages: [{ role: 'user', content: prompt }],
      temperature: 0,
    }),
  });

  return {
    async generate(prompt) {
      const body = await withRateLimitRetry(async (): Promise<unknown> => {
        const response = await fetch(COMPLETIONS_URL, request(prompt));
        if (response.status === 429) {
          throw new RateLimitedError('OpenAI', retryAfterMs(response));
        }
        if (!response.ok) {
          throw new Error(`OpenAI API error (${String(response.status)}): ${await response.text()}`);
        }
        return response.json();
      });

      return completionSchema.parse(body).choices[0].message.content;
    },
  };
}
