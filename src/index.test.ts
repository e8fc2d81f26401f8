import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import {
  createDefaultRegistry,
  createMockClient,
  generateJSON,
  jsonOutputSchema,
  runAgent,
} from './index.js';

beforeEach(() => {
  vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('planloop entry point', () => {
  it('runs a request end to end with the built-in tools', async () => {
    const client = createMockClient([
      '[{"step": 1, "description": "Add the numbers", "action": "Add 2 and 3", "tool": "add", "tool_args": {"add1": 2, "add2": 3}}]',
      '2',
      'The sum is 5.',
    ]);

    const result = await runAgent(
      { client, tools: createDefaultRegistry({ reportsDir: 'reports' }) },
      'What is 2 + 3?',
    );

    expect(result.log.map((record) => record.result)).toEqual(['Tool result: 5']);
    expect(result.finalAnswer).toBe('The sum is 5.');
    expect(jsonOutputSchema.safeParse(generateJSON(result, 0)).success).toBe(true);
  });
});
