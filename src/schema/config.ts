import { z } from 'zod';

import { LIMITS, PATHS } from '../config/defaults.js';

// ── Provider ────────────────────────────────────────────────

export const llmProviderSchema = z.enum(['anthropic', 'openai', 'ollama', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z
  .object({
    provider: llmProviderSchema.optional(),
    model: z.string().min(1).optional(),
    ollamaBaseUrl: z.string().url().optional(),
    maxTotalSteps: z
      .number()
      .int()
      .positive()
      .optional()
      .default(LIMITS.MAX_TOTAL_STEPS),
    maxConsecutiveRegenerations: z
      .number()
      .int()
      .positive()
      .optional()
      .default(LIMITS.MAX_CONSECUTIVE_REGENERATIONS),
    reportsDir: z.string().min(1).optional().default(PATHS.REPORTS_DIR),
    memoryFile: z.string().min(1).optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;
