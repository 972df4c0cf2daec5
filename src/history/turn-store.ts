/**
 * Bounded turn storage with stable identity.
 *
 * Turns are kept in a ring buffer indexed by id. Because ids are issued in
 * creation order and eviction is FIFO, the resident ids always form the
 * contiguous range `[oldestId, nextId)`, so residency is a range check and an id
 * can never resolve to another turn's slot.
 */

import { InvalidArgumentError } from '../errors.js'
import { logLine, logger } from '../logging/logger.js'
import { createTurn, type StableId, type Turn, type TurnInput } from '../types/turn.js'
import { ensureNonNegativeInteger, ensurePositiveInteger } from '../types/validation.js'

/**
 * Options for a TurnStore.
 */
export interface TurnStoreOptions {
  /**
   * Maximum number of resident turns. Must be a positive integer.
   */
  capacity: number

  /**
   * Source of creation timestamps. Defaults to the system clock.
   */
  clock?: () => Date
}

/**
 * Append-only store holding the most recent `capacity` turns across all branches.
 *
 * Eviction is strict FIFO by creation order, regardless of branch: a busy branch
 * can push another branch's turns out. Size the capacity for the retention the
 * quietest branch needs.
 *
 * @example
 * ```typescript
 * const store = new TurnStore({ capacity: 2 })
 * const a = store.append({ userPrompt: 'a' })
 * store.append({ userPrompt: 'b' })
 * store.append({ userPrompt: 'c' })
 * store.get(a) // undefined, evicted
 * ```
 */
export class TurnStore {
  private readonly _capacity: number
  private readonly _clock: () => Date
  private readonly _slots: (Turn | undefined)[]
  private _nextId: StableId = 0
  private _oldestId: StableId = 0

  /**
   * Creates a new TurnStore.
   *
   * @param options - Store options
   * @throws InvalidArgumentError if capacity is not a positive integer
   */
  constructor(options: TurnStoreOptions) {
    this._capacity = ensurePositiveInteger(options.capacity, 'capacity')
    this._clock = options.clock ?? ((): Date => new Date())
    this._slots = new Array<Turn | undefined>(this._capacity).fill(undefined)
  }

  /**
   * Maximum number of resident turns.
   */
  get capacity(): number {
    return this._capacity
  }

  /**
   * Number of turns currently resident.
   */
  get size(): number {
    return this._nextId - this._oldestId
  }

  /**
   * Id the next appended turn will receive.
   */
  get nextId(): StableId {
    return this._nextId
  }

  /**
   * Id of the oldest resident turn. Equals nextId when the store is empty.
   */
  get oldestId(): StableId {
    return this._oldestId
  }

  /**
   * Stores a new turn and returns its id, evicting the oldest turn when full.
   *
   * @param input - Content of the turn
   * @returns The id issued for the turn
   * @throws InvalidArgumentError if the branch or fork parent is malformed
   */
  append(input: TurnInput): StableId {
    const id = this._nextId
    if (input.branch !== undefined) {
      ensureNonNegativeInteger(input.branch, 'branch')
    }
    if (input.forkParent !== undefined) {
      ensureNonNegativeInteger(input.forkParent, 'forkParent')
      if (input.forkParent >= id) {
        throw new InvalidArgumentError(
          logLine({ fork_parent: input.forkParent }, `fork parent must reference a turn issued before id ${id}`)
        )
      }
    }

    const turn = createTurn(id, this._clock().toISOString(), input)

    if (this.size === this._capacity) {
      const evicted = this._slots[this._slot(this._oldestId)]
      this._oldestId += 1
      logger.debug(logLine({ turn_id: evicted?.id, branch: evicted?.branch }, 'evicted oldest turn'))
    }

    this._slots[this._slot(id)] = turn
    this._nextId = id + 1
    return id
  }

  /**
   * Looks up a turn by id.
   *
   * @param id - The id to resolve
   * @returns The turn, or undefined if it was evicted or never issued
   */
  get(id: StableId): Turn | undefined {
    if (!this.has(id)) {
      return undefined
    }
    return this._slots[this._slot(id)]
  }

  /**
   * Returns true if the id refers to a resident turn.
   */
  has(id: StableId): boolean {
    return Number.isInteger(id) && id >= this._oldestId && id < this._nextId
  }

  /**
   * Returns the most recent turns across all branches, oldest first.
   *
   * @param n - Maximum number of turns to return
   * @returns Up to `n` turns
   * @throws InvalidArgumentError if n is not a positive integer
   */
  recent(n: number): Turn[] {
    ensurePositiveInteger(n, 'n')
    const start = Math.max(this._oldestId, this._nextId - n)
    return this._range(start)
  }

  /**
   * Returns every resident turn in creation order.
   */
  turns(): Turn[] {
    return this._range(this._oldestId)
  }

  private _range(start: StableId): Turn[] {
    const result: Turn[] = []
    for (let id = start; id < this._nextId; id++) {
      const turn = this._slots[this._slot(id)]
      if (turn !== undefined) {
        result.push(turn)
      }
    }
    return result
  }

  private _slot(id: StableId): number {
    return id % this._capacity
  }
}
