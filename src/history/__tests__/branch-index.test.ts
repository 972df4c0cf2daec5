import { describe, it, expect } from 'vitest'
import { BranchIndex } from '../branch-index.js'
import { TurnStore } from '../turn-store.js'
import { InvalidArgumentError } from '../../errors.js'
import type { BranchId, TurnInput } from '../../types/turn.js'

function setup(capacity: number): { store: TurnStore; index: BranchIndex; add: (input: TurnInput) => number } {
  const store = new TurnStore({ capacity })
  const index = new BranchIndex(store)
  const add = (input: TurnInput): number => {
    const id = store.append(input)
    index.appendToBranch(input.branch ?? 0, id)
    return id
  }
  return { store, index, add }
}

describe('BranchIndex', () => {
  describe('knownBranches', () => {
    it('contains the default branch from the start', () => {
      const { index } = setup(3)
      expect([...index.knownBranches()]).toEqual([0])
      expect(index.latestBranch).toBe(0)
    })

    it('keeps branches whose turns are all evicted', () => {
      const { index, add } = setup(1)
      add({ branch: 4, userPrompt: 'a' })
      add({ branch: 0, userPrompt: 'b' })

      expect([...index.knownBranches()]).toEqual([0, 4])
      expect(index.branchTurns(4, 10)).toEqual([])
      expect(index.branchIds(4)).toEqual([0])
    })
  })

  describe('appendToBranch', () => {
    it('creates a branch lazily on first use', () => {
      const { index, add } = setup(3)
      add({ branch: 2, userPrompt: 'a' })
      expect(index.hasBranch(2)).toBe(true)
      expect(index.latestBranch).toBe(2)
    })

    it('rejects an id the store has not issued', () => {
      const { index } = setup(3)
      expect(() => index.appendToBranch(0, 0)).toThrow('turn_id=<0> | id has not been issued by the store')
    })

    it('rejects an id that belongs to another branch', () => {
      const { store, index } = setup(3)
      const id = store.append({ branch: 1 })
      expect(() => index.appendToBranch(0, id)).toThrow(InvalidArgumentError)
    })

    it('rejects an id that does not follow the branch sequence', () => {
      const { store, index } = setup(3)
      const first = store.append({ branch: 0 })
      const second = store.append({ branch: 0 })
      index.appendToBranch(0, second)

      expect(() => index.appendToBranch(0, first)).toThrow(
        "turn_id=<0>, branch=<0> | id must follow the branch's last id 1"
      )
    })
  })

  describe('fork parents', () => {
    it('rejects a first turn naming a different parent than the fork point', () => {
      const { store, index, add } = setup(5)
      const a = add({ userPrompt: 'a' })
      const b = add({ userPrompt: 'b' })
      const branch = index.createBranch(a) ?? -1
      const first = store.append({ branch, forkParent: b })

      expect(() => index.appendToBranch(branch, first)).toThrow(
        'branch=<1>, fork_parent=<1>, parent_id=<0> | first turn must name the fork point it was created from'
      )
      expect(index.branchIds(branch)).toEqual([])
    })

    it('rejects a first turn without a fork parent on a forked branch', () => {
      const { store, index, add } = setup(5)
      const a = add({ userPrompt: 'a' })
      const branch = index.createBranch(a) ?? -1
      const first = store.append({ branch, userPrompt: 'orphan' })

      expect(() => index.appendToBranch(branch, first)).toThrow(InvalidArgumentError)
      expect(index.branchIds(branch)).toEqual([])
    })

    it('rejects a fork parent on a turn that is not first in its branch', () => {
      const { store, index, add } = setup(5)
      add({ userPrompt: 'a' })
      add({ userPrompt: 'b' })
      const late = store.append({ branch: 0, forkParent: 0 })

      expect(() => index.appendToBranch(0, late)).toThrow(
        'branch=<0>, fork_parent=<0> | only the first turn of a branch may name a fork parent'
      )
      expect(index.branchIds(0)).toEqual([0, 1])
    })

    it('accepts the recorded parent on the first turn and none afterwards', () => {
      const { index, add } = setup(5)
      const a = add({ userPrompt: 'a' })
      const branch = index.createBranch(a) ?? -1
      const first = add({ branch, forkParent: a })
      const second = add({ branch, userPrompt: 'next' })

      expect(index.branchIds(branch)).toEqual([first, second])
    })
  })

  describe('createBranch', () => {
    it('allocates increasing branch ids for resident parents', () => {
      const { index, add } = setup(3)
      const a = add({ userPrompt: 'a' })

      expect(index.createBranch(a)).toBe(1)
      expect(index.createBranch(a)).toBe(2)
      expect([...index.knownBranches()]).toEqual([0, 1, 2])
    })

    it('allocates above branches created lazily', () => {
      const { index, add } = setup(3)
      const a = add({ branch: 5, userPrompt: 'a' })
      expect(index.createBranch(a)).toBe(6)
    })

    it('returns undefined when the parent has been evicted', () => {
      const { index, add } = setup(1)
      const a = add({ userPrompt: 'a' })
      add({ userPrompt: 'b' })

      expect(index.createBranch(a)).toBeUndefined()
      expect([...index.knownBranches()]).toEqual([0])
    })

    it('returns undefined for an id never issued', () => {
      const { index } = setup(2)
      expect(index.createBranch(7)).toBeUndefined()
    })

    it('records the fork point without touching the parent branch', () => {
      const { index, add } = setup(3)
      const a = add({ userPrompt: 'a' })
      const branch = index.createBranch(a)

      expect(branch).toBe(1)
      expect(index.forkPoint(1)).toEqual({ parentId: a, parentBranch: 0 })
      expect(index.branchIds(0)).toEqual([a])
      expect(index.forkPoint(0)).toBeUndefined()
    })
  })

  describe('branchTurns', () => {
    it('returns the last limit turns of a branch in append order', () => {
      const { index, add } = setup(10)
      add({ branch: 0, userPrompt: 'a' })
      add({ branch: 1, userPrompt: 'x' })
      add({ branch: 0, userPrompt: 'b' })
      add({ branch: 0, userPrompt: 'c' })

      expect(index.branchTurns(0, 2).map((turn) => turn.userPrompt)).toEqual(['b', 'c'])
      expect(index.branchTurns(0, 10).map((turn) => turn.userPrompt)).toEqual(['a', 'b', 'c'])
    })

    it('drops evicted turns and keeps the order of the rest', () => {
      const { index, add } = setup(3)
      const branch: BranchId = 0
      add({ branch, userPrompt: 'a' })
      add({ branch: 1, userPrompt: 'x' })
      add({ branch, userPrompt: 'b' })
      add({ branch, userPrompt: 'c' })

      expect(index.branchTurns(branch, 10).map((turn) => turn.userPrompt)).toEqual(['b', 'c'])
    })

    it('applies the limit before filtering evicted ids', () => {
      const { index, add } = setup(2)
      add({ userPrompt: 'a' })
      add({ userPrompt: 'b' })
      add({ userPrompt: 'c' })

      expect(index.branchTurns(0, 3).map((turn) => turn.userPrompt)).toEqual(['b', 'c'])
      expect(index.branchTurns(0, 1).map((turn) => turn.userPrompt)).toEqual(['c'])
    })

    it('returns an empty list for an unknown branch', () => {
      const { index } = setup(2)
      expect(index.branchTurns(9, 5)).toEqual([])
    })

    it('rejects a non-positive limit', () => {
      const { index } = setup(2)
      expect(() => index.branchTurns(0, 0)).toThrow('Expected limit to be a positive integer, but got 0')
    })
  })
})
