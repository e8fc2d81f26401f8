import type { LLMClient } from '../llm/index.js';
import type { Decision, DecisionSource, ReplanOutcome, RunState } from '../schema/index.js';
import { formatHistory, formatPlan, parseDecision } from '../schema/index.js';
import type { ConversationContext } from '../memory/index.js';
import { formatTurns } from '../memory/index.js';
import * as log from '../utils/logger.js';
import { buildPrompt } from './prompts.js';
import { errorMessage } from './json.js';
import { tryParsePlan, logPlannedSteps } from './planner.js';
import type { PlanParseResult } from './planner.js';
import { latestRecord } from './state.js';

// ── Public types ─────────────────────────────────────────────

export interface ReplannerDeps {
  client: LLMClient;
  context: ConversationContext;
}

// ── Deterministic override ───────────────────────────────────
// Result fragments that mean the latest step failed in a way the plan has
// to change for. Checked before the oracle's answer is used.

export const FORCED_REGENERATION_MARKERS: readonly string[] = [
  '未找到A股代码',
  '未找到美股代码',
  '未找到港股代码',
  '无法识别该公司的股票代码',
  '参数校验失败',
  'ticker not found',
  'company not recognized',
  'validation failed',
];

export function detectForcedRegeneration(state: RunState): string | null {
  const last = latestRecord(state);
  if (!last) return null;

  const lowered = last.result.toLowerCase();
  return (
    FORCED_REGENERATION_MARKERS.find((marker) => lowered.includes(marker.toLowerCase())) ??
    null
  );
}

// ── Decision ─────────────────────────────────────────────────

export interface ResolvedDecision {
  decision: Decision;
  source: DecisionSource;
}

/**
 * Combine the rule layers, highest priority first: forced regeneration,
 * plan exhaustion, the oracle's parsed answer, then continue.
 */
export function resolveDecision(state: RunState, oracleAnswer: string): ResolvedDecision {
  if (detectForcedRegeneration(state) !== null) {
    return { decision: 'regenerate', source: 'override' };
  }
  if (state.cursor >= state.plan.length) {
    return { decision: 'finalize', source: 'exhausted' };
  }

  const parsed = parseDecision(oracleAnswer);
  return parsed === null
    ? { decision: 'continue', source: 'default' }
    : { decision: parsed, source: 'oracle' };
}

async function askOracle(client: LLMClient, state: RunState): Promise<string> {
  const prompt = await buildPrompt('decide', {
    userInput: state.userInput,
    cursor: String(state.cursor),
    total: String(state.plan.length),
    history: formatHistory(state.log),
  });

  try {
    return (await client.generate(prompt)).trim();
  } catch (err) {
    log.warn(`Decision call failed: ${errorMessage(err)}`);
    return '';
  }
}

// ── Main entry ───────────────────────────────────────────────

export async function replan(deps: ReplannerDeps, state: RunState): Promise<ReplanOutcome> {
  const oracleAnswer = await askOracle(deps.client, state);
  const { decision, source } = resolveDecision(state, oracleAnswer);

  log.detail(`Oracle answered: ${JSON.stringify(oracleAnswer)}`);
  log.decision(decision, source);

  switch (decision) {
    case 'continue':
      return { decision, source, oracleAnswer };
    case 'regenerate': {
      const regenerated = await regeneratePlan(deps, state);
      return regenerated.ok
        ? { decision, source, oracleAnswer, plan: regenerated.plan }
        : { decision, source, oracleAnswer, plan: null, error: regenerated.error };
    }
    case 'finalize':
      return {
        decision,
        source,
        oracleAnswer,
        finalAnswer: await composeFinalAnswer(deps.client, state),
      };
  }
}

// ── Regeneration ─────────────────────────────────────────────

async function regeneratePlan(
  deps: ReplannerDeps,
  state: RunState,
): Promise<PlanParseResult> {
  log.llm('Replanner rebuilding the plan...');

  const prompt = await buildPrompt('replan', {
    turns: formatTurns(deps.context.recentTurns),
    summary: deps.context.summary || '(none)',
    userInput: state.userInput,
    plan: formatPlan(state.plan),
    cursor: String(state.cursor),
    history: formatHistory(state.log),
  });

  let result: PlanParseResult;
  try {
    result = tryParsePlan(await deps.client.generate(prompt));
  } catch (err) {
    result = { ok: false, error: errorMessage(err) };
  }

  if (result.ok) {
    logPlannedSteps(result.plan);
  } else {
    log.warn(`Replan output unusable, keeping the current plan: ${result.error}`);
  }
  return result;
}

// ── Final answer ─────────────────────────────────────────────

/**
 * Compose the answer from the log. `notice` is passed through to the
 * prompt when the run is being cut short.
 */
export async function composeFinalAnswer(
  client: LLMClient,
  state: RunState,
  notice?: string,
): Promise<string> {
  log.llm('Composing final answer...');

  const prompt = await buildPrompt('final_answer', {
    userInput: state.userInput,
    history: formatHistory(state.log),
    notice: notice ? `\nNote: ${notice}\n` : '',
  });

  try {
    return (await client.generate(prompt)).trim();
  } catch (err) {
    log.warn(`Final answer call failed: ${errorMessage(err)}`);
    return insufficientInformationAnswer(state, notice);
  }
}

export function insufficientInformationAnswer(state: RunState, notice?: string): string {
  const lines = [
    `There is not enough information to fully answer: "${state.userInput}".`,
  ];
  if (notice) lines.push('', notice);
  if (state.log.length > 0) {
    lines.push('', 'What was gathered:');
    for (const record of state.log) {
      lines.push(`- ${record.description}: ${record.result}`);
    }
  }
  return lines.join('\n');
}
