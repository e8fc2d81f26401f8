import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, it, expect, afterEach } from 'vitest';
import { InvalidArgumentError } from 'commander';

import type { RunResult } from '../core/orchestrator.js';
import { fileConfigSchema } from '../schema/config.js';
import { ConversationMemory } from '../memory/conversation.js';
import { TOOL_CATALOG } from '../tools/catalog.js';
import {
  EXIT_CODES,
  clearMemory,
  exitCodeFor,
  parsePositiveInt,
  resolveLLMEnv,
  selectToolSchemas,
} from './run.js';

const RESULT: RunResult = {
  runId: 'run-1',
  userInput: 'What is X?',
  plan: [{ index: 1, description: 'Answer', action: 'Write the answer' }],
  cursor: 1,
  log: [{ index: 1, description: 'Answer', action: 'Write the answer', result: 'X is 42.' }],
  completed: true,
  finalAnswer: 'X is 42.',
  degraded: null,
  steps: 1,
  regenerations: 0,
  startedAt: '2024-01-02T03:04:05.000Z',
  finishedAt: '2024-01-02T03:04:05.100Z',
  durationMs: 100,
};

describe('exitCodeFor', () => {
  it('separates clean and degraded runs', () => {
    expect(exitCodeFor(RESULT)).toBe(EXIT_CODES.COMPLETED);
    expect(exitCodeFor({ ...RESULT, degraded: 'max_consecutive_regenerations' })).toBe(
      EXIT_CODES.DEGRADED,
    );
  });
});

describe('parsePositiveInt', () => {
  it('accepts positive integers', () => {
    expect(parsePositiveInt('12')).toBe(12);
  });

  it.each(['0', '-1', '2.5', 'ten'])('rejects %j', (value) => {
    expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError);
  });
});

describe('resolveLLMEnv', () => {
  it('lets the config file override the environment', () => {
    const env = resolveLLMEnv(fileConfigSchema.parse({ provider: 'ollama', model: 'llama3' }), {
      LLM_PROVIDER: 'anthropic',
      PLANLOOP_MODEL: 'other',
      ANTHROPIC_API_KEY: 'test-key',
    });

    expect(env).toEqual({
      LLM_PROVIDER: 'ollama',
      PLANLOOP_MODEL: 'llama3',
      ANTHROPIC_API_KEY: 'test-key',
    });
  });

  it('keeps the environment when the file is silent', () => {
    const env = resolveLLMEnv(fileConfigSchema.parse({}), { LLM_PROVIDER: 'mock' });
    expect(env).toEqual({ LLM_PROVIDER: 'mock' });
  });
});

describe('selectToolSchemas', () => {
  const registered = [TOOL_CATALOG.add];

  it('lists the registered tools by default and the catalog with all', () => {
    expect(selectToolSchemas(registered, {})).toEqual([TOOL_CATALOG.add]);
    expect(selectToolSchemas(registered, { all: true }).map((schema) => schema.name)).toEqual([
      'add',
      'stock_search',
      'get_current_time',
      'generate_markdown_report',
      'retrieve_reports',
    ]);
  });

  it('shows a single catalogued tool by name', () => {
    expect(selectToolSchemas(registered, { name: 'retrieve_reports' })).toEqual([
      TOOL_CATALOG.retrieve_reports,
    ]);
  });

  it('rejects names outside the catalog', () => {
    expect(() => selectToolSchemas(registered, { name: 'weather' })).toThrow(
      'Unknown tool "weather". Catalogued tools: add, stock_search, get_current_time, generate_markdown_report, retrieve_reports',
    );
  });
});

describe('clearMemory', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir !== undefined) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('persists the cleared memory so the next session starts empty', async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'planloop-cli-'));
    const file = path.join(dir, 'memory.json');

    const memory = new ConversationMemory();
    memory.commit('What is X?', 'X is 42.');
    await memory.save(file);

    await clearMemory(memory, file);

    const reloaded = new ConversationMemory();
    await reloaded.load(file);
    expect(reloaded.size).toBe(0);
  });
});
