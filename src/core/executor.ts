import type { LLMClient } from '../llm/index.js';
import type { ExecutionRecord, RunState, Step, ToolArgs } from '../schema/index.js';
import { formatHistory, argumentResolutionSchema, toArgumentResolution } from '../schema/index.js';
import type { ToolInvoker } from '../tools/index.js';
import { renderArgumentContract } from '../tools/index.js';
import { TOKEN_GUARDS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { buildPrompt } from './prompts.js';
import { errorMessage, extractJSON, tryParseJSON } from './json.js';
import type { ArgumentAliases, ValueCoercions } from './arguments.js';
import {
  DEFAULT_ARGUMENT_ALIASES,
  DEFAULT_VALUE_COERCIONS,
  applyAliases,
  normalizeArgs,
  validateArgs,
} from './arguments.js';
import type { StepFailureKind, StepOutcome } from './state.js';

// ── Public types ─────────────────────────────────────────────

export interface ExecutorDeps {
  client: LLMClient;
  tools: ToolInvoker;
  aliases?: ArgumentAliases;
  coercions?: ValueCoercions;
}

type ArgumentSource =
  | { ok: true; args: ToolArgs; resolved: boolean }
  | { ok: false; result: string };

// ── Main entry ───────────────────────────────────────────────

/**
 * Execute the step under the cursor. Exactly one record comes back for
 * every executed step, failures included; this never throws.
 */
export async function executeStep(
  deps: ExecutorDeps,
  state: RunState,
): Promise<StepOutcome> {
  const step = state.plan[state.cursor];
  if (state.cursor >= state.plan.length || step === undefined) {
    return { status: 'exhausted', completed: true };
  }

  log.stepStarted(state.cursor, state.plan.length, step.description);

  const { result, failure } = step.tool === undefined
    ? await runOracleStep(deps.client, step, state)
    : await runToolStep(deps, step, step.tool, state);

  const record: ExecutionRecord = {
    index: step.index,
    description: step.description,
    action: step.action,
    result,
  };

  log.stepFinished(state.cursor, state.plan.length, failure === undefined, preview(result));

  return failure === undefined
    ? { status: 'executed', record }
    : { status: 'executed', record, failure };
}

// ── No-tool steps ────────────────────────────────────────────

interface StepResult {
  result: string;
  failure?: StepFailureKind;
}

async function runOracleStep(
  client: LLMClient,
  step: Step,
  state: RunState,
): Promise<StepResult> {
  try {
    const prompt = await buildPrompt('execute_step', {
      action: step.action,
      userInput: state.userInput,
      history: formatHistory(state.log),
    });
    return { result: await client.generate(prompt) };
  } catch (err) {
    return { result: `Task execution failed: ${errorMessage(err)}`, failure: 'oracle' };
  }
}

// ── Tool steps ───────────────────────────────────────────────

async function runToolStep(
  deps: ExecutorDeps,
  step: Step,
  tool: string,
  state: RunState,
): Promise<StepResult> {
  const source = hasCompleteArgs(step.toolArgs)
    ? { ok: true as const, args: step.toolArgs, resolved: false }
    : await resolveArgs(deps, step, tool, state);

  if (!source.ok) {
    return { result: source.result, failure: 'argument_resolution' };
  }

  const aliased = source.resolved
    ? applyAliases(source.args, deps.aliases ?? DEFAULT_ARGUMENT_ALIASES)
    : source.args;
  const finalArgs = normalizeArgs(tool, aliased, deps.coercions ?? DEFAULT_VALUE_COERCIONS);

  const schema = deps.tools.schemas().find((candidate) => candidate.name === tool);
  const check = validateArgs(finalArgs, schema);
  if (!check.ok) {
    log.warn(check.message);
    return { result: check.message, failure: 'argument_validation' };
  }

  log.tool(tool, finalArgs);
  try {
    const output = await deps.tools.invoke(tool, finalArgs);
    return { result: `Tool result: ${formatContent(output.content)}` };
  } catch (err) {
    return { result: `Tool "${tool}" failed: ${errorMessage(err)}`, failure: 'tool' };
  }
}

// An empty object counts as missing: planners emit `{}` when they leave
// the arguments to resolution.
function hasCompleteArgs(args: ToolArgs | undefined): args is ToolArgs {
  if (args === undefined) return false;
  const values = Object.values(args);
  return values.length > 0 && values.every((value) => value !== null && value !== undefined);
}

async function resolveArgs(
  deps: ExecutorDeps,
  step: Step,
  tool: string,
  state: RunState,
): Promise<ArgumentSource> {
  log.llm(`Resolving arguments for ${tool}...`);

  let raw: string;
  try {
    const prompt = await buildPrompt('resolve_args', {
      toolName: tool,
      action: step.action,
      userInput: state.userInput,
      history: formatHistory(state.log),
      contract: renderArgumentContract(deps.tools.schemas()),
    });
    raw = await deps.client.generate(prompt);
  } catch (err) {
    return { ok: false, result: `Argument resolution failed: ${errorMessage(err)}` };
  }

  const json = tryParseJSON(extractJSON(raw, '{'));
  if (!json.ok) {
    return {
      ok: false,
      result: `Argument resolution failed: ${json.error}. Raw response: ${clip(raw)}`,
    };
  }

  const parsed = argumentResolutionSchema.safeParse(json.value);
  if (!parsed.success) {
    return {
      ok: false,
      result: `Argument resolution failed: unexpected response shape (${parsed.error.issues[0]?.message ?? 'invalid'}). Raw response: ${clip(raw)}`,
    };
  }

  const resolution = toArgumentResolution(parsed.data);
  if (resolution.rationale) log.detail(`Resolver: ${resolution.rationale}`);
  return { ok: true, args: resolution.args, resolved: true };
}

// ── Formatting helpers ───────────────────────────────────────

export function formatContent(content: unknown): string {
  if (typeof content === 'string') return content;
  if (content === undefined) return '(no content)';
  try {
    return JSON.stringify(content);
  } catch {
    return String(content);
  }
}

function clip(text: string): string {
  return text.length > TOKEN_GUARDS.MAX_RAW_RESPONSE_CHARS
    ? `${text.slice(0, TOKEN_GUARDS.MAX_RAW_RESPONSE_CHARS)}…`
    : text;
}

function preview(text: string): string {
  const oneLine = text.replace(/\s+/g, ' ').trim();
  return oneLine.length > TOKEN_GUARDS.MAX_RESULT_PREVIEW_CHARS
    ? `${oneLine.slice(0, TOKEN_GUARDS.MAX_RESULT_PREVIEW_CHARS)}…`
    : oneLine;
}
