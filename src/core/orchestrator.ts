import { randomUUID } from 'node:crypto';

import type {
  DegradedReason,
  ExecutionRecord,
  Plan,
  ReplanOutcome,
  RunState,
} from '../schema/index.js';
import type { ConversationContext } from '../memory/index.js';
import { EMPTY_CONTEXT } from '../memory/index.js';
import { LIMITS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { createPlan } from './planner.js';
import type { ExecutorDeps } from './executor.js';
import { executeStep } from './executor.js';
import { replan, composeFinalAnswer } from './replanner.js';
import { applyReplanOutcome, applyStepOutcome, createRunState } from './state.js';

// ── Public types ─────────────────────────────────────────────

export interface OrchestratorDeps extends ExecutorDeps {
  context?: ConversationContext;
}

export interface RunOptions {
  maxTotalSteps?: number | undefined;
  maxConsecutiveRegenerations?: number | undefined;
}

export interface RunResult {
  runId: string;
  userInput: string;
  plan: Plan;
  cursor: number;
  log: readonly ExecutionRecord[];
  completed: boolean;
  finalAnswer: string;
  /** Set when a loop bound cut the run short. */
  degraded: DegradedReason | null;
  /** Execute calls that ran a step. */
  steps: number;
  /** Regenerate decisions, abandoned ones included. */
  regenerations: number;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

// ── Main agent loop ──────────────────────────────────────────

/**
 * Plan once, then alternate Execute and Replan until the Replanner
 * finalizes or a loop bound is hit. This is the only writer of RunState.
 */
export async function runAgent(
  deps: OrchestratorDeps,
  userInput: string,
  options: RunOptions = {},
): Promise<RunResult> {
  const runId = randomUUID();
  const startedAt = new Date();
  const maxTotalSteps = options.maxTotalSteps ?? LIMITS.MAX_TOTAL_STEPS;
  const maxRegenerations =
    options.maxConsecutiveRegenerations ?? LIMITS.MAX_CONSECUTIVE_REGENERATIONS;
  const context = deps.context ?? EMPTY_CONTEXT;

  // ── 1. Plan ────────────────────────────────────────────────

  log.section('Planning');
  const plan = await createPlan(deps.client, {
    userInput,
    context,
    toolNames: deps.tools.names(),
  });

  let state: RunState = createRunState(userInput, plan);
  let steps = 0;
  let regenerations = 0;
  let consecutiveRegenerations = 0;
  let degraded: DegradedReason | null = null;

  // ── 2. Execute / Replan ────────────────────────────────────

  log.section('Executing');
  while (!state.completed) {
    if (steps >= maxTotalSteps) {
      degraded = 'max_total_steps';
      break;
    }

    const outcome = await executeStep(deps, state);
    if (outcome.status === 'executed') steps++;
    state = applyStepOutcome(state, outcome);

    const decision: ReplanOutcome = await replan({ client: deps.client, context }, state);
    if (decision.decision === 'regenerate') {
      regenerations++;
      consecutiveRegenerations++;
    } else {
      consecutiveRegenerations = 0;
    }
    state = applyReplanOutcome(state, decision);

    if (!state.completed && consecutiveRegenerations > maxRegenerations) {
      degraded = 'max_consecutive_regenerations';
      break;
    }
  }

  // ── 3. Degraded finalize ───────────────────────────────────

  if (degraded !== null) {
    const notice = degradedNotice(
      degraded,
      degraded === 'max_total_steps' ? steps : consecutiveRegenerations,
    );
    log.warn(notice);
    log.decision('finalize', 'limit');
    const finalAnswer = await composeFinalAnswer(deps.client, state, notice);
    state = applyReplanOutcome(state, {
      decision: 'finalize',
      source: 'limit',
      oracleAnswer: '',
      finalAnswer,
    });
  }

  const finalAnswer = state.finalAnswer ?? '';
  log.section('Final answer');
  log.detail(finalAnswer);

  const finishedAt = new Date();
  return {
    runId,
    userInput,
    plan: state.plan,
    cursor: state.cursor,
    log: state.log,
    completed: state.completed,
    finalAnswer,
    degraded,
    steps,
    regenerations,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: finishedAt.getTime() - startedAt.getTime(),
  };
}

// ── Helpers ──────────────────────────────────────────────────

export function degradedNotice(reason: DegradedReason, count: number): string {
  switch (reason) {
    case 'max_total_steps':
      return `Stopped after ${String(count)} executed steps without reaching a final decision.`;
    case 'max_consecutive_regenerations':
      return `Stopped after ${String(count)} consecutive plan regenerations.`;
  }
}
