/**
 * Branching conversation history.
 *
 * Owns one TurnStore and one BranchIndex and keeps them consistent: a turn is
 * appended to the store and recorded in its branch in the same synchronous call,
 * so no reader ever sees a branch id whose turn is not yet resident.
 */

import { logLine, logger } from '../logging/logger.js'
import { assembleMessages } from '../messages/message-assembler.js'
import type { Message } from '../types/messages.js'
import { DEFAULT_BRANCH, type BranchId, type StableId, type Turn, type TurnInput } from '../types/turn.js'
import { ensurePositiveInteger } from '../types/validation.js'
import { BranchIndex, type ForkPoint } from './branch-index.js'
import { DEFAULT_CAPACITY, DEFAULT_CONTEXT_LIMIT, type HistoryConfig } from './config.js'
import { lineage, type LineageStep } from './lineage.js'
import { TurnStore } from './turn-store.js'

/**
 * Prompts that replace the parent's when forking.
 */
export interface ForkOverrides {
  systemPrompt?: string
  userPrompt?: string
}

/**
 * Outcome of a successful fork.
 */
export interface ForkResult {
  /**
   * The newly created branch.
   */
  branch: BranchId

  /**
   * First turn of the new branch, carrying the fork parent.
   */
  turn: Turn
}

/**
 * Options for reading a branch as messages.
 */
export interface MessagesOptions {
  /**
   * Number of trailing branch turns to include. Defaults to the history's context limit.
   */
  limit?: number

  /**
   * Text of the request about to be sent, appended as a final user message.
   */
  pendingUserText?: string
}

/**
 * A bounded, branching record of conversation turns.
 *
 * @example
 * ```typescript
 * const history = new ConversationHistory({ capacity: 100 })
 * const first = history.record({ userPrompt: 'Write a haiku', response: 'Autumn moonlight...' })
 *
 * const fork = history.fork(first.id, { userPrompt: 'Write a limerick' })
 * if (fork) {
 *   const messages = history.messagesFor(fork.branch, { pendingUserText: 'Make it rhyme' })
 * }
 * ```
 */
export class ConversationHistory {
  private readonly _store: TurnStore
  private readonly _index: BranchIndex
  private readonly _contextLimit: number

  /**
   * Creates a new ConversationHistory.
   *
   * @param config - History configuration
   * @throws InvalidArgumentError if capacity or contextLimit is not a positive integer
   */
  constructor(config?: HistoryConfig) {
    this._contextLimit = ensurePositiveInteger(config?.contextLimit ?? DEFAULT_CONTEXT_LIMIT, 'contextLimit')
    this._store = new TurnStore({
      capacity: config?.capacity ?? DEFAULT_CAPACITY,
      clock: config?.clock,
    })
    this._index = new BranchIndex(this._store)
  }

  /**
   * The underlying store, for read access by collaborators.
   */
  get store(): TurnStore {
    return this._store
  }

  /**
   * The underlying branch index, for read access by collaborators.
   */
  get index(): BranchIndex {
    return this._index
  }

  /**
   * Number of trailing branch turns read when no limit is given.
   */
  get contextLimit(): number {
    return this._contextLimit
  }

  /**
   * Highest branch id created so far.
   */
  get latestBranch(): BranchId {
    return this._index.latestBranch
  }

  /**
   * Stores a turn and records it in its branch.
   *
   * @param input - Content of the turn; the branch defaults to the default branch
   * @returns The stored turn
   * @throws InvalidArgumentError if the branch or fork parent is malformed, or the
   *         fork parent does not fit the turn's place in its branch
   */
  record(input: TurnInput): Turn {
    // Checked before appending so a rejected turn never reaches the store.
    this._index.checkForkParent(input.branch ?? DEFAULT_BRANCH, input.forkParent)

    const id = this._store.append(input)
    const turn = this._store.get(id)
    if (turn === undefined) {
      throw new Error(logLine({ turn_id: id }, 'appended turn is not resident'))
    }
    this._index.appendToBranch(turn.branch, id)
    return turn
  }

  /**
   * Forks a new branch from a resident turn and records its first turn.
   *
   * The first turn copies the parent's system and user prompts unless
   * overridden, has no response yet, and points back at the parent.
   *
   * @param parentId - Turn to fork from
   * @param overrides - Prompts to use instead of the parent's
   * @returns The new branch and its first turn, or undefined if the parent is no longer resident
   */
  fork(parentId: StableId, overrides?: ForkOverrides): ForkResult | undefined {
    const parent = this._store.get(parentId)
    const branch = this._index.createBranch(parentId)
    if (parent === undefined || branch === undefined) {
      logger.debug(logLine({ parent_id: parentId }, 'fork parent not resident'))
      return undefined
    }

    const turn = this.record({
      branch,
      forkParent: parentId,
      systemPrompt: overrides?.systemPrompt ?? parent.systemPrompt,
      userPrompt: overrides?.userPrompt ?? parent.userPrompt,
    })

    return { branch, turn }
  }

  /**
   * Allocates a branch forked from a resident turn without recording a turn.
   *
   * @param parentId - Turn to fork from
   * @returns The new branch id, or undefined if the parent is no longer resident
   */
  createBranch(parentId: StableId): BranchId | undefined {
    return this._index.createBranch(parentId)
  }

  /**
   * Looks up a turn by id.
   *
   * @returns The turn, or undefined if it was evicted or never issued
   */
  get(id: StableId): Turn | undefined {
    return this._store.get(id)
  }

  /**
   * Returns the most recent turns across all branches, oldest first.
   */
  recent(n: number = this._contextLimit): Turn[] {
    return this._store.recent(n)
  }

  /**
   * Returns the resident turns among a branch's last `limit` turns, in order.
   */
  branchTurns(branch: BranchId, limit: number = this._contextLimit): Turn[] {
    return this._index.branchTurns(branch, limit)
  }

  /**
   * Returns every branch id ever created, in ascending order.
   */
  knownBranches(): ReadonlySet<BranchId> {
    return this._index.knownBranches()
  }

  /**
   * Returns where a branch was forked, if it was created by forking.
   */
  forkPoint(branch: BranchId): ForkPoint | undefined {
    return this._index.forkPoint(branch)
  }

  /**
   * Returns the ancestry of a branch, nearest fork parent first.
   */
  lineage(branch: BranchId): LineageStep[] {
    return lineage(this._index, this._store, branch)
  }

  /**
   * Builds the message list for a request on a branch.
   *
   * @param branch - Branch to read
   * @param options - Window size and pending user text
   * @returns Messages ready for a generation client
   */
  messagesFor(branch: BranchId, options?: MessagesOptions): Message[] {
    const turns = this.branchTurns(branch, options?.limit ?? this._contextLimit)
    return assembleMessages(turns, options?.pendingUserText)
  }
}
