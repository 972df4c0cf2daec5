import { logLine, logger } from '../logging/logger.js'
import type { BranchId, StableId, Turn } from '../types/turn.js'
import type { BranchIndex } from './branch-index.js'
import type { TurnStore } from './turn-store.js'

/**
 * One hop of a branch's ancestry.
 */
export interface LineageStep {
  /**
   * Id of the turn the child branch was forked from.
   */
  parentId: StableId

  /**
   * Branch holding the parent turn.
   */
  branch: BranchId

  /**
   * The resolved parent turn.
   */
  turn: Turn
}

/**
 * Finds the turn a branch was forked from.
 *
 * Prefers the fork point recorded by the index. Branches created lazily by an
 * append fall back to the `forkParent` of the first id recorded for the branch,
 * while that turn is resident.
 *
 * @param index - Branch index holding the branch
 * @param store - Store resolving the branch's ids
 * @param branch - Branch to inspect
 * @returns The fork parent's id, or undefined for a root branch or an unknown one
 */
export function forkParentOf(index: BranchIndex, store: TurnStore, branch: BranchId): StableId | undefined {
  const recorded = index.forkPoint(branch)
  if (recorded !== undefined) {
    return recorded.parentId
  }

  const firstId = index.branchIds(branch)[0]
  return firstId === undefined ? undefined : store.get(firstId)?.forkParent
}

/**
 * Walks a branch's ancestry through fork parents.
 *
 * Each step resolves the fork parent, then continues from the parent's branch.
 * Fork parents always precede every id of the child branch, so the walk ends;
 * it stops early at the first ancestor that has been evicted.
 *
 * @example
 * ```typescript
 * // branch 2 forked from turn 5 (branch 1), which forked from turn 1 (branch 0)
 * lineage(index, store, 2).map((step) => [step.parentId, step.branch]) // [[5, 1], [1, 0]]
 * ```
 *
 * @param index - Branch index holding the branch
 * @param store - Store resolving ancestor ids
 * @param branch - Branch to start from
 * @returns One step per resident fork parent, nearest ancestor first
 */
export function lineage(index: BranchIndex, store: TurnStore, branch: BranchId): LineageStep[] {
  const ancestors: LineageStep[] = []
  const visited = new Set<BranchId>([branch])
  let current = branch

  for (;;) {
    const parentId = forkParentOf(index, store, current)
    if (parentId === undefined) {
      break
    }

    const parent = store.get(parentId)
    if (parent === undefined) {
      logger.debug(logLine({ branch: current, parent_id: parentId }, 'ancestor evicted, lineage stops here'))
      break
    }

    ancestors.push({ parentId, branch: parent.branch, turn: parent })
    if (visited.has(parent.branch)) {
      break
    }
    visited.add(parent.branch)
    current = parent.branch
  }

  return ancestors
}
