/**
 * Tool module.
 * The registry is the only boundary between the agent and side effects.
 * Built-in tools are described by the catalog; hosts register the rest.
 */

import { ToolRegistry } from './registry.js';
import { createAddTool } from './add.js';
import { createCurrentTimeTool } from './currentTime.js';
import { createMarkdownReportTool } from './markdownReport.js';

export * from './catalog.js';
export * from './registry.js';
export { createAddTool } from './add.js';
export { createCurrentTimeTool, formatTime } from './currentTime.js';
export type { TimeFormat, DetailedTime } from './currentTime.js';
export {
  createMarkdownReportTool,
  renderMarkdownReport,
  reportTitle,
  reportFileStem,
} from './markdownReport.js';
export type { MarkdownReportOptions, MarkdownReportResult } from './markdownReport.js';

// ── Default registry ─────────────────────────────────────────

export interface DefaultRegistryOptions {
  reportsDir: string;
}

/**
 * The tools this package implements. Market data and report retrieval
 * are catalogued but left to the host to register.
 */
export function createDefaultRegistry(options: DefaultRegistryOptions): ToolRegistry {
  return new ToolRegistry()
    .register(createAddTool())
    .register(createCurrentTimeTool())
    .register(createMarkdownReportTool({ reportsDir: options.reportsDir }));
}
