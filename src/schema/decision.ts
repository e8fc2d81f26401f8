import { z } from 'zod';

import type { Plan } from './plan.js';

// ── Decision ──────────────────────────────────────────────────

// Order matters: the oracle answers with the one-based position.
export const decisionSchema = z.enum(['continue', 'finalize', 'regenerate']);

export type Decision = z.infer<typeof decisionSchema>;

/** Which rule layer produced a decision. */
export type DecisionSource = 'override' | 'exhausted' | 'oracle' | 'default' | 'limit';

// ── Oracle answer parser ──────────────────────────────────────
// The decision prompt asks for a single digit: 1 continue, 2 finalize,
// 3 regenerate. Anything else is unparseable.

export function parseDecision(raw: string): Decision | null {
  const match = /^[\s"'`*([]*([123])(?!\d)/.exec(raw);
  const digit = match?.[1];
  if (digit === undefined) return null;
  return decisionSchema.options[Number(digit) - 1] ?? null;
}

// ── Replanner outcome ─────────────────────────────────────────

export type ReplanOutcome =
  | { decision: 'continue'; source: DecisionSource; oracleAnswer: string }
  | {
      decision: 'regenerate';
      source: DecisionSource;
      oracleAnswer: string;
      plan: Plan;
    }
  | {
      decision: 'regenerate';
      source: DecisionSource;
      oracleAnswer: string;
      plan: null;
      error: string;
    }
  | {
      decision: 'finalize';
      source: DecisionSource;
      oracleAnswer: string;
      finalAnswer: string;
    };
