import type {
  ExecutionRecord,
  Plan,
  ReplanOutcome,
  RunState,
} from '../schema/index.js';

// ── Step outcome ─────────────────────────────────────────────

export type StepFailureKind =
  | 'oracle'
  | 'argument_resolution'
  | 'argument_validation'
  | 'tool';

/**
 * What one Execute call produced. `exhausted` means the cursor was already
 * past the plan and nothing ran; the Replanner finalizes from there.
 */
export type StepOutcome =
  | { status: 'exhausted'; completed: true }
  | { status: 'executed'; record: ExecutionRecord; failure?: StepFailureKind };

// ── Transitions ──────────────────────────────────────────────
// Pure: each returns a new RunState and leaves its input untouched.

export function createRunState(userInput: string, plan: Plan): RunState {
  return { userInput, plan, cursor: 0, log: [], completed: false };
}

export function applyStepOutcome(state: RunState, outcome: StepOutcome): RunState {
  if (outcome.status === 'exhausted') return state;

  return {
    ...state,
    cursor: state.cursor + 1,
    log: [...state.log, outcome.record],
  };
}

export function applyReplanOutcome(state: RunState, outcome: ReplanOutcome): RunState {
  switch (outcome.decision) {
    case 'continue':
      return state;
    case 'regenerate':
      if (outcome.plan === null) return state;
      return { ...state, plan: outcome.plan, cursor: 0 };
    case 'finalize':
      return { ...state, completed: true, finalAnswer: outcome.finalAnswer };
  }
}

export function latestRecord(state: RunState): ExecutionRecord | undefined {
  return state.log[state.log.length - 1];
}
