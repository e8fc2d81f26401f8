import { describe, it, expect } from 'vitest';

import { buildPrompt, renderTemplate } from './prompts.js';

describe('renderTemplate', () => {
  it('fills known placeholders and leaves unknown ones', () => {
    expect(renderTemplate('Hi {{name}}, {{missing}}', { name: 'Ada' })).toBe('Hi Ada, {{missing}}');
  });

  it('inserts replacement patterns literally', () => {
    expect(renderTemplate('{{value}}', { value: "$& and $'" })).toBe("$& and $'");
  });
});

describe('buildPrompt', () => {
  it('renders a template from the prompts directory', async () => {
    const prompt = await buildPrompt('decide', {
      userInput: 'What is 6 x 7?',
      cursor: '1',
      total: '3',
      history: 'Step 1 result: 42',
    });

    expect(prompt).toContain('Original user request: What is 6 x 7?');
    expect(prompt).toContain('Progress: step 1 of 3');
    expect(prompt).toContain('Step 1 result: 42');
    expect(prompt).not.toContain('{{');
  });
});
