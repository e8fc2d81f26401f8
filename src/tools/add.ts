import { z } from 'zod';

import { TOOL_CATALOG } from './catalog.js';
import type { ToolDefinition } from './registry.js';

const addArgsSchema = z.object({
  add1: z.coerce.number().int(),
  add2: z.coerce.number().int(),
});

export function createAddTool(): ToolDefinition {
  return {
    schema: TOOL_CATALOG.add,
    handler(args) {
      const { add1, add2 } = addArgsSchema.parse(args);
      return add1 + add2;
    },
  };
}
