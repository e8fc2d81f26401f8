import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { ConversationMemory, formatTurns } from './conversation.js';

const NOW = new Date('2024-01-02T03:04:05.000Z');

function memory(options: { capacity?: number; summaryWindow?: number; recentTurns?: number } = {}) {
  return new ConversationMemory({ ...options, now: () => NOW });
}

describe('ConversationMemory', () => {
  it('starts empty', () => {
    expect(memory().snapshot()).toEqual({ summary: '', recentTurns: [] });
  });

  it('commits a finished exchange and refreshes the summary', () => {
    const mem = memory();
    mem.commit('What is X?', 'X is 42.');

    expect(mem.size).toBe(2);
    expect(mem.snapshot()).toEqual({
      summary: 'What is X?\nX is 42.',
      recentTurns: [
        { role: 'user', content: 'What is X?', timestamp: NOW.toISOString() },
        { role: 'assistant', content: 'X is 42.', timestamp: NOW.toISOString() },
      ],
    });
  });

  it('keeps only the most recent messages up to capacity', () => {
    const mem = memory({ capacity: 3 });
    for (const content of ['a', 'b', 'c', 'd']) mem.addMessage('user', content);

    expect(mem.size).toBe(3);
    expect(mem.snapshot().recentTurns.map((turn) => turn.content)).toEqual(['b', 'c', 'd']);
  });

  it('summarizes the latest window and exposes the latest turns', () => {
    const mem = memory({ summaryWindow: 2, recentTurns: 1 });
    mem.commit('first question', 'first answer');
    mem.commit('second question', 'second answer');

    const snapshot = mem.snapshot();
    expect(snapshot.summary).toBe('second question\nsecond answer');
    expect(snapshot.recentTurns.map((turn) => turn.content)).toEqual(['second answer']);
  });

  it('clears turns and summary', () => {
    const mem = memory();
    mem.commit('q', 'a');
    mem.clear();

    expect(mem.size).toBe(0);
    expect(mem.snapshot()).toEqual({ summary: '', recentTurns: [] });
  });

  describe('persistence', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(tmpdir(), 'planloop-memory-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('saves and loads turns with the summary', async () => {
      const file = path.join(dir, 'nested', 'memory.json');
      const saved = memory();
      saved.commit('What is X?', 'X is 42.');
      await saved.save(file);

      const loaded = memory();
      await loaded.load(file);

      expect(loaded.snapshot()).toEqual(saved.snapshot());
      expect(JSON.parse(await readFile(file, 'utf-8'))).toMatchObject({ summary: 'What is X?\nX is 42.' });
    });

    it('ignores a missing file', async () => {
      const mem = memory();
      await mem.load(path.join(dir, 'absent.json'));
      expect(mem.size).toBe(0);
    });

    it('rejects a malformed file', async () => {
      const file = path.join(dir, 'memory.json');
      await writeFile(file, JSON.stringify({ turns: [{ role: 'system', content: 'x' }], summary: '' }), 'utf-8');

      await expect(memory().load(file)).rejects.toThrow();
    });
  });
});

describe('formatTurns', () => {
  it('renders one line per turn', () => {
    expect(
      formatTurns([
        { role: 'user', content: 'hi', timestamp: NOW.toISOString() },
        { role: 'assistant', content: 'hello', timestamp: NOW.toISOString() },
      ]),
    ).toBe('user: hi\nassistant: hello');
    expect(formatTurns([])).toBe('(no earlier conversation)');
  });
});
