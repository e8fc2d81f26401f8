import { z } from 'zod';

// ── Tool arguments ────────────────────────────────────────────

export const toolArgsSchema = z.record(z.unknown());

export type ToolArgs = z.infer<typeof toolArgsSchema>;

// ── Step ──────────────────────────────────────────────────────

export const stepSchema = z.object({
  index: z.number().int().positive(),
  description: z.string().min(1),
  action: z.string().min(1),
  tool: z.string().min(1).optional(),
  toolArgs: toolArgsSchema.optional(),
});

export type Step = Readonly<z.infer<typeof stepSchema>>;

// ── Plan ──────────────────────────────────────────────────────

export type Plan = readonly Step[];

// ── Raw oracle step ───────────────────────────────────────────
// What the model writes. Numbering is ignored: a step's index is its
// position in the plan.

const NO_TOOL_SPELLINGS = new Set(['', 'none', 'null', 'undefined', 'n/a']);

export const rawPlanStepSchema = z.object({
  step: z.unknown().optional(),
  description: z.string().min(1),
  action: z.string().min(1),
  tool: z.string().nullable().optional(),
  tool_args: toolArgsSchema.nullable().optional(),
});

export type RawPlanStep = z.infer<typeof rawPlanStepSchema>;

export const rawPlanSchema = z.array(rawPlanStepSchema).min(1);

export function toStep(raw: RawPlanStep, position: number): Step {
  const tool = raw.tool?.trim();
  const hasTool = tool !== undefined && !NO_TOOL_SPELLINGS.has(tool.toLowerCase());

  return stepSchema.parse({
    index: position + 1,
    description: raw.description,
    action: raw.action,
    ...(hasTool ? { tool } : {}),
    ...(hasTool && raw.tool_args ? { toolArgs: raw.tool_args } : {}),
  });
}

// ── ExecutionRecord ───────────────────────────────────────────

export const executionRecordSchema = z.object({
  index: z.number().int().positive(),
  description: z.string(),
  action: z.string(),
  result: z.string(),
});

export type ExecutionRecord = Readonly<z.infer<typeof executionRecordSchema>>;

// ── RunState ──────────────────────────────────────────────────

export interface RunState {
  readonly userInput: string;
  readonly plan: Plan;
  readonly cursor: number;
  readonly log: readonly ExecutionRecord[];
  readonly completed: boolean;
  readonly finalAnswer?: string | undefined;
}

// ── Formatting helpers ────────────────────────────────────────

export function formatHistory(log: readonly ExecutionRecord[]): string {
  if (log.length === 0) return '(no steps executed yet)';

  return log
    .map((record) => `Step ${String(record.index)} result: ${record.result}`)
    .join('\n');
}

export function formatPlan(plan: Plan): string {
  return JSON.stringify(
    plan.map((step) => ({
      step: step.index,
      description: step.description,
      action: step.action,
      tool: step.tool ?? null,
      tool_args: step.toolArgs ?? null,
    })),
    null,
    2,
  );
}
