/**
 * Main entry point for forkline.
 *
 * Records conversation turns in a bounded store, organizes them into branches
 * that can fork from any earlier turn, and assembles the message list a
 * generation client needs for a branch.
 */

// Error types
export { InvalidArgumentError, TurnValidationError } from './errors.js'

// Turn types
export type { BranchId, StableId, Turn, TurnData, TurnInput } from './types/turn.js'
export { DEFAULT_BRANCH, turnFromData, turnToData } from './types/turn.js'

// Message types
export type { Message, Role } from './types/messages.js'

// History
export {
  BranchIndex,
  ConversationHistory,
  DEFAULT_CAPACITY,
  DEFAULT_CONTEXT_LIMIT,
  TurnStore,
  forkParentOf,
  lineage,
  loadHistoryConfigFromEnv,
} from './history/index.js'
export type {
  ForkOverrides,
  ForkPoint,
  ForkResult,
  HistoryConfig,
  LineageStep,
  MessagesOptions,
  TurnStoreOptions,
} from './history/index.js'

// Message assembly
export { assembleMessages, lastMessageContent } from './messages/index.js'

// Logging
export { configureLogging } from './logging/index.js'
export type { Logger } from './logging/index.js'
