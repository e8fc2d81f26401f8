import { readFile, writeFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import { MEMORY } from '../config/defaults.js';

// ── Schemas ──────────────────────────────────────────────────

export const conversationRoleSchema = z.enum(['user', 'assistant']);

export type ConversationRole = z.infer<typeof conversationRoleSchema>;

export const conversationTurnSchema = z.object({
  role: conversationRoleSchema,
  content: z.string(),
  timestamp: z.string().datetime(),
});

export type ConversationTurn = z.infer<typeof conversationTurnSchema>;

const memoryFileSchema = z.object({
  turns: z.array(conversationTurnSchema),
  summary: z.string(),
});

/**
 * What planning and replanning see of the conversation. Passed in
 * explicitly; nothing reads shared conversation state during a run.
 */
export interface ConversationContext {
  readonly summary: string;
  readonly recentTurns: readonly ConversationTurn[];
}

export const EMPTY_CONTEXT: ConversationContext = { summary: '', recentTurns: [] };

export interface ConversationMemoryOptions {
  capacity?: number;
  summaryWindow?: number;
  recentTurns?: number;
  now?: () => Date;
}

// ── Memory ───────────────────────────────────────────────────

/**
 * Short-term conversation memory: a bounded window of turns plus a
 * rolling summary rebuilt from the latest messages on every commit.
 */
export class ConversationMemory {
  private turns: ConversationTurn[] = [];
  private summary = '';
  private readonly capacity: number;
  private readonly summaryWindow: number;
  private readonly recentTurnCount: number;
  private readonly now: () => Date;

  constructor(options: ConversationMemoryOptions = {}) {
    this.capacity = options.capacity ?? MEMORY.CAPACITY;
    this.summaryWindow = options.summaryWindow ?? MEMORY.SUMMARY_WINDOW;
    this.recentTurnCount = options.recentTurns ?? MEMORY.RECENT_TURNS;
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.turns.length;
  }

  addMessage(role: ConversationRole, content: string): void {
    this.turns.push({ role, content, timestamp: this.now().toISOString() });
    if (this.turns.length > this.capacity) {
      this.turns = this.turns.slice(-this.capacity);
    }
  }

  refreshSummary(): string {
    this.summary = this.turns
      .slice(-this.summaryWindow)
      .map((turn) => turn.content)
      .join('\n');
    return this.summary;
  }

  /** Record a finished exchange. Called once a run has completed. */
  commit(userInput: string, finalAnswer: string): void {
    this.addMessage('user', userInput);
    this.addMessage('assistant', finalAnswer);
    this.refreshSummary();
  }

  snapshot(): ConversationContext {
    return {
      summary: this.summary,
      recentTurns: this.turns.slice(-this.recentTurnCount),
    };
  }

  clear(): void {
    this.turns = [];
    this.summary = '';
  }

  // ── Persistence ───────────────────────────────────────────

  async load(filePath: string): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf-8');
    } catch (err) {
      if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') {
        return;
      }
      throw err;
    }

    const data = memoryFileSchema.parse(JSON.parse(raw));
    this.turns = data.turns.slice(-this.capacity);
    this.summary = data.summary;
  }

  async save(filePath: string): Promise<void> {
    await mkdir(path.dirname(filePath), { recursive: true });
    const data = { turns: this.turns, summary: this.summary };
    await writeFile(filePath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
  }
}

export function formatTurns(turns: readonly ConversationTurn[]): string {
  if (turns.length === 0) return '(no earlier conversation)';
  return turns.map((turn) => `${turn.role}: ${turn.content}`).join('\n');
}
