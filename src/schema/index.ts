/**
 * zod schemas and their inferred types for plans, decisions, resolver
 * answers, config and the JSON output.
 */

export * from './plan.js';
export * from './decision.js';
export * from './resolution.js';
export * from './config.js';
export * from './jsonOutput.js';
