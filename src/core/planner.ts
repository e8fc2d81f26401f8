import type { LLMClient } from '../llm/index.js';
import type { Plan, Step } from '../schema/index.js';
import { rawPlanSchema, toStep } from '../schema/index.js';
import type { ConversationContext } from '../memory/index.js';
import * as log from '../utils/logger.js';
import { buildPrompt } from './prompts.js';
import { errorMessage, extractJSON, tryParseJSON } from './json.js';

// ── Public types ─────────────────────────────────────────────

export interface PlannerInput {
  userInput: string;
  context: ConversationContext;
  toolNames: readonly string[];
}

// ── Fallback plan ────────────────────────────────────────────

export const DEFAULT_PLAN: Plan = [
  {
    index: 1,
    description: 'Analyze the request',
    action: 'Analyze what the user is asking for',
  },
  {
    index: 2,
    description: 'Perform the core task',
    action: 'Carry out the main work the request calls for',
  },
  {
    index: 3,
    description: 'Summarize the results',
    action: 'Summarize the results and present them to the user',
  },
];

// ── Pre-validation fixups ────────────────────────────────────
// Models sometimes drop one of description/action. Fill it from the
// other before zod validation.

function fixupRawSteps(parsed: unknown): unknown {
  if (!Array.isArray(parsed)) return parsed;

  return parsed.map((step: unknown) => {
    if (typeof step !== 'object' || step === null) return step;
    const s: Record<string, unknown> = { ...step };

    if (!s['description'] && typeof s['action'] === 'string') {
      s['description'] = s['action'];
    }
    if (!s['action'] && typeof s['description'] === 'string') {
      s['action'] = s['description'];
    }

    return s;
  });
}

// ── Parsing ──────────────────────────────────────────────────

export type PlanParseResult =
  | { ok: true; plan: Plan }
  | { ok: false; error: string };

export function tryParsePlan(raw: string): PlanParseResult {
  const json = tryParseJSON(extractJSON(raw, '['));
  if (!json.ok) return json;

  const result = rawPlanSchema.safeParse(fixupRawSteps(json.value));
  if (!result.success) {
    return { ok: false, error: result.error.message };
  }

  return { ok: true, plan: result.data.map(toStep) };
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Produce the initial plan. Always returns a non-empty plan: any failure
 * to obtain or parse one falls back to {@link DEFAULT_PLAN}.
 */
export async function createPlan(
  client: LLMClient,
  input: PlannerInput,
): Promise<Plan> {
  log.llm('Planner generating steps...');

  const prompt = await buildPrompt('planner', {
    summary: input.context.summary || '(none)',
    userInput: input.userInput,
    toolNames: JSON.stringify(input.toolNames),
  });

  let raw: string;
  try {
    raw = await client.generate(prompt);
  } catch (err) {
    log.warn(`Planner call failed, using default plan: ${errorMessage(err)}`);
    return DEFAULT_PLAN;
  }

  const parsed = tryParsePlan(raw);
  if (!parsed.ok) {
    log.warn(`Planner output unusable, using default plan: ${parsed.error}`);
    return DEFAULT_PLAN;
  }

  logPlannedSteps(parsed.plan);
  return parsed.plan;
}

export function logPlannedSteps(plan: Plan): void {
  log.planned(plan.length);
  plan.forEach((step: Step) => {
    log.detail(`${String(step.index)}. ${step.description}`);
    log.detail(`   action: ${step.action}`);
    log.detail(`   tool:   ${step.tool ?? '(none)'}`);
  });
}
