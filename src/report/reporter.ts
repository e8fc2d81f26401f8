import type { ExecutionRecord, Step } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput, JsonOutputRecord, JsonOutputStep } from '../schema/jsonOutput.js';
import type { RunResult } from '../core/orchestrator.js';

// Re-export contract types for consumers
export type { JsonOutput, JsonOutputStep, JsonOutputRecord };

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(run: RunResult, exitCode: number): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    runId: run.runId,
    userInput: run.userInput,
    plan: run.plan.map(stepToJSON),
    cursor: run.cursor,
    log: run.log.map(recordToJSON),
    completed: run.completed,
    finalAnswer: run.finalAnswer,
    degraded: run.degraded,
    steps: run.steps,
    regenerations: run.regenerations,
    durationMs: run.durationMs,
    exitCode,
  };
}

function stepToJSON(step: Step): JsonOutputStep {
  return {
    index: step.index,
    description: step.description,
    action: step.action,
    tool: step.tool ?? null,
    toolArgs: step.toolArgs ?? null,
  };
}

function recordToJSON(record: ExecutionRecord): JsonOutputRecord {
  return {
    index: record.index,
    description: record.description,
    action: record.action,
    result: record.result,
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(entries);
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(run: RunResult): string {
  const lines: string[] = [];

  // Header + metadata
  lines.push(`# planloop Run`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Request** | ${escapeMarkdownCell(run.userInput)} |`);
  lines.push(`| **Run ID** | \`${run.runId}\` |`);
  lines.push(`| **Started** | ${run.startedAt} |`);
  lines.push(`| **Finished** | ${run.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(run.durationMs)} |`);
  lines.push(`| **Steps executed** | ${String(run.steps)} |`);
  lines.push(`| **Regenerations** | ${String(run.regenerations)} |`);
  lines.push(`| **Result** | ${resultLabel(run)} |`);
  lines.push('');

  // Final plan
  lines.push(`## Plan`);
  lines.push('');
  lines.push(`| # | Description | Tool |`);
  lines.push(`|---|-------------|------|`);
  for (const step of run.plan) {
    lines.push(
      `| ${String(step.index)} | ${escapeMarkdownCell(step.description)} | ${step.tool ?? '-'} |`,
    );
  }
  lines.push('');

  // Execution log
  lines.push(`## Execution Log`);
  lines.push('');
  if (run.log.length === 0) {
    lines.push('_No steps were executed._');
    lines.push('');
  }
  run.log.forEach((record, position) => {
    lines.push(`### ${String(position + 1)}. Step ${String(record.index)}: ${record.description}`);
    lines.push('');
    lines.push(`**Action:** ${record.action}`);
    lines.push('');
    lines.push('```');
    lines.push(record.result);
    lines.push('```');
    lines.push('');
  });

  // Answer
  lines.push(`## Final Answer`);
  lines.push('');
  lines.push(run.finalAnswer);
  lines.push('');

  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function resultLabel(run: RunResult): string {
  if (!run.completed) return 'INCOMPLETE';
  return run.degraded === null ? 'COMPLETED' : `DEGRADED (${run.degraded})`;
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
