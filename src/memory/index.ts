/**
 * Conversation memory module.
 * Read by planning as context; written only after a run completes.
 */

export {
  ConversationMemory,
  EMPTY_CONTEXT,
  formatTurns,
  conversationRoleSchema,
  conversationTurnSchema,
} from './conversation.js';
export type {
  ConversationContext,
  ConversationMemoryOptions,
  ConversationRole,
  ConversationTurn,
} from './conversation.js';
