import { z } from 'zod';

import { executionRecordSchema, toolArgsSchema } from './plan.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Plan output ─────────────────────────────────────────────

export const jsonOutputStepSchema = z.object({
  index: z.number().int().positive(),
  description: z.string(),
  action: z.string(),
  tool: z.string().nullable(),
  toolArgs: toolArgsSchema.nullable(),
});

export type JsonOutputStep = z.infer<typeof jsonOutputStepSchema>;

export const jsonOutputRecordSchema = executionRecordSchema;

export type JsonOutputRecord = z.infer<typeof jsonOutputRecordSchema>;

// ── Root output ─────────────────────────────────────────────

export const degradedReasonSchema = z.enum([
  'max_total_steps',
  'max_consecutive_regenerations',
]);

export type DegradedReason = z.infer<typeof degradedReasonSchema>;

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  runId: z.string().min(1),
  userInput: z.string(),
  plan: z.array(jsonOutputStepSchema),
  cursor: z.number().int().nonnegative(),
  log: z.array(jsonOutputRecordSchema),
  completed: z.boolean(),
  finalAnswer: z.string(),
  degraded: degradedReasonSchema.nullable(),
  steps: z.number().int().nonnegative(),
  regenerations: z.number().int().nonnegative(),
  durationMs: z.number().int().nonnegative(),
  exitCode: z.number().int().nonnegative(),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
