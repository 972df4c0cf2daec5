/**
 * History exports.
 *
 * This module exports the turn store, branch index and the history that owns both.
 */

export { TurnStore, type TurnStoreOptions } from './turn-store.js'
export { BranchIndex, type ForkPoint } from './branch-index.js'
export { lineage, forkParentOf, type LineageStep } from './lineage.js'
export {
  ConversationHistory,
  type ForkOverrides,
  type ForkResult,
  type MessagesOptions,
} from './conversation-history.js'
export { DEFAULT_CAPACITY, DEFAULT_CONTEXT_LIMIT, loadHistoryConfigFromEnv, type HistoryConfig } from './config.js'
