import { z } from 'zod';

import { toolArgsSchema } from './plan.js';
import type { ToolArgs } from './plan.js';

// ── Argument resolution response ──────────────────────────────
// The resolver answers with a rationale and an argument mapping. Models
// prompted in Chinese keep the localized keys, so both spellings count.

export const argumentResolutionSchema = z
  .object({
    analysis: z.string().optional(),
    arguments: toolArgsSchema.nullable().optional(),
    分析: z.string().optional(),
    参数: toolArgsSchema.nullable().optional(),
  })
  .passthrough();

export interface ArgumentResolution {
  rationale: string;
  args: ToolArgs;
}

export function toArgumentResolution(
  parsed: z.infer<typeof argumentResolutionSchema>,
): ArgumentResolution {
  return {
    rationale: parsed.analysis ?? parsed['分析'] ?? '',
    args: parsed.arguments ?? parsed['参数'] ?? {},
  };
}
