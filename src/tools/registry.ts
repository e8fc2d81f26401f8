import type { ToolArgs } from '../schema/index.js';
import type { ToolSchema } from './catalog.js';

// ── Public types ─────────────────────────────────────────────

export interface ToolResult {
  type: 'tool_result';
  tool: string;
  content: unknown;
}

export type ToolHandler = (args: ToolArgs) => unknown;

export interface ToolDefinition {
  schema: ToolSchema;
  handler: ToolHandler;
}

/** The narrow surface the executor depends on. */
export interface ToolInvoker {
  invoke(name: string, args: ToolArgs): Promise<ToolResult>;
  names(): string[];
  schemas(): ToolSchema[];
}

// ── Errors ───────────────────────────────────────────────────

export class ToolNotRegisteredError extends Error {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool "${toolName}" is not registered`);
    this.name = 'ToolNotRegisteredError';
    this.toolName = toolName;
  }
}

// ── Registry ─────────────────────────────────────────────────

export class ToolRegistry implements ToolInvoker {
  private readonly tools = new Map<string, ToolDefinition>();

  /**
   * Register a tool. Throws if a tool with the same name is already registered.
   */
  register(definition: ToolDefinition): this {
    const { name } = definition.schema;
    if (this.tools.has(name)) {
      throw new Error(`Tool "${name}" is already registered`);
    }
    this.tools.set(name, definition);
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  schemas(): ToolSchema[] {
    return Array.from(this.tools.values(), (tool) => tool.schema);
  }

  /**
   * Run a registered tool. Handler failures propagate to the caller
   * unchanged.
   */
  async invoke(name: string, args: ToolArgs): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) throw new ToolNotRegisteredError(name);

    const content = await tool.handler(args);
    return { type: 'tool_result', tool: name, content };
  }
}
