import { z } from 'zod';

import type { LLMClient } from './client.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'qwen2.5:7b';
const DEFAULT_BASE_URL = 'http://localhost:11434';

// ── Response validation ──────────────────────────────────────

const chatResponseSchema = z.object({
  message: z.object({
    content: z.string(),
  }),
});

// ── Provider factory ─────────────────────────────────────────

/**
 * Local models served by Ollama. Non-streaming `/api/chat` calls; a slow
 * model simply blocks the run.
 */
export function createOllamaClient(
  baseUrl?: string,
  model?: string,
): LLMClient {
  // Relative join keeps any path prefix on the base.
  const base = (baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '') + '/';
  const endpoint = new URL('api/chat', base).toString();
  const resolvedModel = model ?? DEFAULT_MODEL;

  return {
    async generate(prompt: string): Promise<string> {
      const response = await fetch(endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: resolvedModel,
          messages: [{ role: 'user', content: prompt }],
          stream: false,
        }),
      });

      if (!response.ok) {
        const body = await response.text();
        throw new Error(
          `Ollama API error (${String(response.status)}): ${body}`,
        );
      }

      const body: unknown = await response.json();
      return chatResponseSchema.parse(body).message.content;
    },
  };
}
