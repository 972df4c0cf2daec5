/**
 * Branch bookkeeping over a TurnStore.
 *
 * Branches hold turn ids, never storage positions. Ids of evicted turns stay in
 * the sequences and are filtered out when a branch is read.
 */

import { InvalidArgumentError } from '../errors.js'
import { logLine, logger } from '../logging/logger.js'
import { DEFAULT_BRANCH, type BranchId, type StableId, type Turn } from '../types/turn.js'
import { ensureNonNegativeInteger, ensurePositiveInteger } from '../types/validation.js'
import type { TurnStore } from './turn-store.js'

/**
 * Where a forked branch attaches to its parent.
 */
export interface ForkPoint {
  /**
   * Id of the turn the branch was forked from.
   */
  parentId: StableId

  /**
   * Branch the parent turn belonged to when the fork was created.
   */
  parentBranch: BranchId
}

/**
 * Maps each branch to the ordered ids of its turns and records fork points.
 *
 * The default branch exists from construction. Every other branch is created
 * either by {@link BranchIndex.createBranch} or lazily on its first append.
 * Branches are never removed, even after all of their turns are evicted.
 */
export class BranchIndex {
  private readonly _store: TurnStore
  private readonly _sequences = new Map<BranchId, StableId[]>()
  private readonly _forkPoints = new Map<BranchId, ForkPoint>()
  private _nextBranchId: BranchId = DEFAULT_BRANCH + 1

  /**
   * Creates a new BranchIndex.
   *
   * @param store - The store that issues and resolves the indexed ids
   */
  constructor(store: TurnStore) {
    this._store = store
    this._sequences.set(DEFAULT_BRANCH, [])
  }

  /**
   * Highest branch id known to the index.
   */
  get latestBranch(): BranchId {
    return this._nextBranchId - 1
  }

  /**
   * Records an id at the end of a branch, creating the branch on first use.
   *
   * @param branch - Branch to extend
   * @param id - Id returned by the store for a turn of that branch
   * @throws InvalidArgumentError if the id was never issued, belongs to another
   *         branch, does not come after the branch's last id, or carries a fork
   *         parent that disagrees with the branch's fork point
   */
  appendToBranch(branch: BranchId, id: StableId): void {
    ensureNonNegativeInteger(branch, 'branch')
    ensureNonNegativeInteger(id, 'id')

    if (id >= this._store.nextId) {
      throw new InvalidArgumentError(logLine({ turn_id: id }, 'id has not been issued by the store'))
    }

    const turn = this._store.get(id)
    if (turn !== undefined) {
      if (turn.branch !== branch) {
        throw new InvalidArgumentError(logLine({ turn_id: id, branch }, `turn belongs to branch ${turn.branch}`))
      }
      this.checkForkParent(branch, turn.forkParent)
    }

    const sequence = this._sequence(branch)
    const last = sequence[sequence.length - 1]
    if (last !== undefined && id <= last) {
      throw new InvalidArgumentError(logLine({ turn_id: id, branch }, `id must follow the branch's last id ${last}`))
    }

    sequence.push(id)
  }

  /**
   * Checks that the next turn of a branch may carry the given fork parent.
   *
   * Only a branch's first turn names a fork parent. When the branch was created
   * by {@link BranchIndex.createBranch}, its first turn must name the recorded parent.
   *
   * @param branch - Branch about to be extended
   * @param forkParent - Fork parent of the turn to append, if any
   * @throws InvalidArgumentError if the fork parent is not allowed here
   */
  checkForkParent(branch: BranchId, forkParent: StableId | undefined): void {
    const isFirst = (this._sequences.get(branch)?.length ?? 0) === 0
    if (!isFirst) {
      if (forkParent !== undefined) {
        throw new InvalidArgumentError(
          logLine({ branch, fork_parent: forkParent }, 'only the first turn of a branch may name a fork parent')
        )
      }
      return
    }

    const point = this._forkPoints.get(branch)
    if (point !== undefined && forkParent !== point.parentId) {
      throw new InvalidArgumentError(
        logLine(
          { branch, fork_parent: forkParent, parent_id: point.parentId },
          'first turn must name the fork point it was created from'
        )
      )
    }
  }

  /**
   * Allocates a new branch forked from a resident turn.
   *
   * The caller is expected to append the branch's first turn with
   * `forkParent` set to `parentId`. Neither the parent turn nor its branch change.
   *
   * @param parentId - Turn to fork from
   * @returns The new branch id, or undefined if the parent is no longer resident
   */
  createBranch(parentId: StableId): BranchId | undefined {
    const parent = this._store.get(parentId)
    if (parent === undefined) {
      return undefined
    }

    const branch = this._nextBranchId
    this._sequences.set(branch, [])
    this._forkPoints.set(branch, { parentId, parentBranch: parent.branch })
    this._nextBranchId = branch + 1

    logger.debug(logLine({ branch, parent_id: parentId, parent_branch: parent.branch }, 'created branch'))
    return branch
  }

  /**
   * Resolves the most recent turns of a branch, skipping evicted ones.
   *
   * @param branch - Branch to read
   * @param limit - Number of trailing ids to resolve
   * @returns Resident turns among the last `limit` ids, in append order
   * @throws InvalidArgumentError if limit is not a positive integer
   */
  branchTurns(branch: BranchId, limit: number): Turn[] {
    ensurePositiveInteger(limit, 'limit')
    const sequence = this._sequences.get(branch)
    if (sequence === undefined) {
      return []
    }

    const turns: Turn[] = []
    for (const id of sequence.slice(-limit)) {
      const turn = this._store.get(id)
      if (turn !== undefined) {
        turns.push(turn)
      }
    }
    return turns
  }

  /**
   * Returns a copy of every id recorded for a branch, evicted or not.
   */
  branchIds(branch: BranchId): StableId[] {
    return [...(this._sequences.get(branch) ?? [])]
  }

  /**
   * Returns every branch id ever created, in ascending order.
   */
  knownBranches(): ReadonlySet<BranchId> {
    return new Set([...this._sequences.keys()].sort((a, b) => a - b))
  }

  /**
   * Returns true if the branch has been created.
   */
  hasBranch(branch: BranchId): boolean {
    return this._sequences.has(branch)
  }

  /**
   * Returns the fork point recorded when the branch was created, if any.
   */
  forkPoint(branch: BranchId): ForkPoint | undefined {
    const point = this._forkPoints.get(branch)
    return point === undefined ? undefined : { ...point }
  }

  private _sequence(branch: BranchId): StableId[] {
    let sequence = this._sequences.get(branch)
    if (sequence === undefined) {
      sequence = []
      this._sequences.set(branch, sequence)
      this._nextBranchId = Math.max(this._nextBranchId, branch + 1)
    }
    return sequence
  }
}
