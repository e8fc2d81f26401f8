/**
 * planloop library entry.
 * The agent loop, its tool registry and conversation memory, and the
 * provider-agnostic oracle clients.
 */

export * from './schema/index.js';
export * from './core/index.js';
export * from './tools/index.js';
export * from './memory/index.js';
export * from './config/index.js';
export { generateMarkdown, generateJSON, serializeJSON } from './report/index.js';
export {
  createLLMClient,
  loadLLMConfig,
  llmConfigSchema,
  createAnthropicClient,
  createOpenAIClient,
  createOllamaClient,
  createMockClient,
  RateLimitedError,
  withRateLimitRetry,
} from './llm/index.js';
export type { LLMClient, LLMConfig, MockLLMClient, RetryOptions } from './llm/index.js';
