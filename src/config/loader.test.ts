import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { loadConfigFile } from './loader.js';

describe('loadConfigFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'planloop-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns the defaults when the file does not exist', async () => {
    await expect(loadConfigFile(path.join(dir, '.planloop.yaml'))).resolves.toEqual({
      maxTotalSteps: 30,
      maxConsecutiveRegenerations: 3,
      reportsDir: 'reports',
    });
  });

  it('reads YAML and fills in the rest', async () => {
    const file = path.join(dir, '.planloop.yaml');
    await writeFile(file, 'provider: mock\nmaxTotalSteps: 5\nmemoryFile: .planloop/memory.json\n', 'utf-8');

    await expect(loadConfigFile(file)).resolves.toEqual({
      provider: 'mock',
      maxTotalSteps: 5,
      maxConsecutiveRegenerations: 3,
      reportsDir: 'reports',
      memoryFile: '.planloop/memory.json',
    });
  });

  it('reads JSON', async () => {
    const file = path.join(dir, 'planloop.json');
    await writeFile(file, JSON.stringify({ provider: 'ollama', ollamaBaseUrl: 'http://localhost:11434' }), 'utf-8');

    await expect(loadConfigFile(file)).resolves.toMatchObject({
      provider: 'ollama',
      ollamaBaseUrl: 'http://localhost:11434',
    });
  });

  it('treats an empty file as defaults', async () => {
    const file = path.join(dir, '.planloop.yaml');
    await writeFile(file, '', 'utf-8');

    await expect(loadConfigFile(file)).resolves.toMatchObject({ maxTotalSteps: 30 });
  });

  it('rejects unknown keys and bad values', async () => {
    const file = path.join(dir, '.planloop.yaml');
    await writeFile(file, 'maxTotalSteps: 0\nheadless: true\n', 'utf-8');

    await expect(loadConfigFile(file)).rejects.toThrow(`Invalid config file ${file}`);
  });
});
