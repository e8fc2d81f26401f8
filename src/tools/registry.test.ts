import { describe, it, expect } from 'vitest';

import { ToolNotRegisteredError, ToolRegistry } from './registry.js';
import { renderArgumentContract, TOOL_CATALOG } from './catalog.js';
import { createDefaultRegistry } from './index.js';
import { createAddTool } from './add.js';

describe('ToolRegistry', () => {
  it('invokes a registered tool and wraps its content', async () => {
    const registry = new ToolRegistry().register(createAddTool());

    await expect(registry.invoke('add', { add1: 2, add2: 3 })).resolves.toEqual({
      type: 'tool_result',
      tool: 'add',
      content: 5,
    });
  });

  it('refuses duplicate names', () => {
    const registry = new ToolRegistry().register(createAddTool());
    expect(() => registry.register(createAddTool())).toThrow('Tool "add" is already registered');
  });

  it('throws ToolNotRegisteredError for unknown names', async () => {
    const registry = new ToolRegistry();

    await expect(registry.invoke('missing', {})).rejects.toBeInstanceOf(ToolNotRegisteredError);
    await expect(registry.invoke('missing', {})).rejects.toThrow('Tool "missing" is not registered');
  });

  it('propagates handler failures', async () => {
    const registry = new ToolRegistry().register({
      schema: { name: 'broken', description: 'Always fails.', parameters: {} },
      handler() {
        throw new Error('boom');
      },
    });

    await expect(registry.invoke('broken', {})).rejects.toThrow('boom');
  });

  it('lists names and schemas in registration order', () => {
    const registry = createDefaultRegistry({ reportsDir: 'reports' });

    expect(registry.names()).toEqual(['add', 'get_current_time', 'generate_markdown_report']);
    expect(registry.schemas().map((schema) => schema.name)).toEqual(registry.names());
    expect(registry.has('stock_search')).toBe(false);
  });
});

describe('renderArgumentContract', () => {
  it('describes every argument with its type, required flag and choices', () => {
    const contract: unknown = JSON.parse(
      renderArgumentContract([TOOL_CATALOG.add, TOOL_CATALOG.get_current_time]),
    );

    expect(contract).toEqual({
      add: {
        description: 'Adds two integers.',
        parameters: {
          add1: { type: 'int', description: 'First addend', required: true },
          add2: { type: 'int', description: 'Second addend', required: true },
        },
      },
      get_current_time: {
        description: 'Returns the current local time.',
        parameters: {
          time_format: {
            type: 'str',
            description: 'Output format, defaults to standard',
            required: false,
            enum: [
              { value: 'standard', description: 'YYYY-MM-DD HH:MM:SS' },
              { value: 'timestamp', description: 'Unix timestamp in seconds' },
              { value: 'detailed', description: 'Broken-down date fields' },
              { value: 'chinese', description: 'YYYY年MM月DD日 HH时MM分SS秒' },
            ],
          },
        },
      },
    });
  });
});
