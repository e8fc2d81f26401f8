import { z } from 'zod';

import { llmProviderSchema } from '../schema/config.js';

export { llmProviderSchema };
export type { LLMProvider } from '../schema/config.js';

// ── LLMClient interface ──────────────────────────────────────
// The oracle: one blocking text-in, text-out call. Output is untrusted.

export interface LLMClient {
  generate(prompt: string): Promise<string>;
}

// ── Config schema ────────────────────────────────────────────

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

// ── Env loader ───────────────────────────────────────────────

export function loadLLMConfig(env: NodeJS.ProcessEnv = process.env): LLMConfig {
  const provider = env['LLM_PROVIDER'] ?? 'anthropic';

  const apiKey = provider === 'anthropic'
    ? env['ANTHROPIC_API_KEY']
    : provider === 'openai'
      ? env['OPENAI_API_KEY']
      : undefined;

  return llmConfigSchema.parse({
    provider,
    apiKey: apiKey || undefined,
    model: env['PLANLOOP_MODEL'] || undefined,
    baseUrl: env['OLLAMA_BASE_URL'] || undefined,
  });
}
