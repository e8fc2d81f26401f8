/**
 * Run trace on stderr. One line per planner, executor and replanner event,
 * so stdout carries nothing but the answer or the JSON record.
 */

import type { Decision, DecisionSource } from '../schema/index.js';

// ── Output ───────────────────────────────────────────────────

let quiet = false;

/** Silence every trace line except warnings. */
export function setQuiet(value: boolean): void {
  quiet = value;
}

function emit(line: string): void {
  if (!quiet) process.stderr.write(line + '\n');
}

function position(cursor: number, total: number): string {
  return `[${String(cursor + 1)}/${String(total)}]`;
}

// ── Run phases ───────────────────────────────────────────────

export function section(title: string): void {
  const rule = '─'.repeat(50);
  emit(`\n${rule}\n▶  ${title}\n${rule}`);
}

export function detail(message: string): void {
  emit(`   ${message}`);
}

export function llm(message: string): void {
  emit(`🧠 ${message}`);
}

export function planned(stepCount: number): void {
  emit(`🗺️  Plan ready: ${String(stepCount)} step${stepCount === 1 ? '' : 's'}`);
}

// ── Steps ────────────────────────────────────────────────────

export function stepStarted(cursor: number, total: number, description: string): void {
  emit(`📋 ${position(cursor, total)} ${description}`);
}

export function stepFinished(cursor: number, total: number, ok: boolean, preview: string): void {
  emit(`${ok ? '✅' : '❌'} ${position(cursor, total)} ${preview}`);
}

export function tool(name: string, args: Readonly<Record<string, unknown>>): void {
  emit(`🔧 ${name} ${JSON.stringify(args)}`);
}

// ── Decisions ────────────────────────────────────────────────

const DECISION_ICONS: Record<Decision, string> = {
  continue: '➡️ ',
  regenerate: '🔄',
  finalize: '🎯',
};

export function decision(value: Decision, source: DecisionSource): void {
  emit(`${DECISION_ICONS[value]} Decision: ${value} (${source})`);
}

// Warnings bypass quiet mode.
export function warn(message: string): void {
  process.stderr.write(`⚠️  ${message}\n`);
}
