/**
 * Core orchestration module.
 * Coordinates planner → executor → replanner around an immutable RunState.
 * No CLI and no provider-specific code.
 */

export { createPlan, tryParsePlan, DEFAULT_PLAN } from './planner.js';
export type { PlannerInput, PlanParseResult } from './planner.js';
export { executeStep, formatContent } from './executor.js';
export type { ExecutorDeps } from './executor.js';
export {
  replan,
  resolveDecision,
  detectForcedRegeneration,
  composeFinalAnswer,
  insufficientInformationAnswer,
  FORCED_REGENERATION_MARKERS,
} from './replanner.js';
export type { ReplannerDeps, ResolvedDecision } from './replanner.js';
export { runAgent, degradedNotice } from './orchestrator.js';
export type { OrchestratorDeps, RunOptions, RunResult } from './orchestrator.js';
export {
  createRunState,
  applyStepOutcome,
  applyReplanOutcome,
  latestRecord,
} from './state.js';
export type { StepOutcome, StepFailureKind } from './state.js';
export {
  DEFAULT_ARGUMENT_ALIASES,
  DEFAULT_VALUE_COERCIONS,
  FREE_TEXT_ARGUMENTS,
  PLACEHOLDER_KEYWORDS,
  applyAliases,
  normalizeArgs,
  validateArgs,
} from './arguments.js';
export type { ArgumentAliases, ValueCoercions, ArgumentCheck } from './arguments.js';
