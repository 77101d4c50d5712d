import { describe, expect, it } from 'vitest'
import { BranchCatalogBuilder, BranchConsolidator, BranchTracer, CommitIndex } from '../../domain'
import { localBranch, rawCommit, remoteBranch, settingsFor } from '../helpers/graph-fixtures'

describe('BranchConsolidator', () => {
  describe('consolidate', () => {
    it('drops merge-derived candidates that own nothing', () => {
      const index = CommitIndex.build([
        rawCommit('m', ['b', 'f'], "Merge branch 'feature/x'"),
        rawCommit('f', ['a']),
        rawCommit('b', ['a']),
        rawCommit('a')
      ])
      const { candidates, remotes } = BranchCatalogBuilder.build({
        index,
        branches: [localBranch('main', 'm'), localBranch('feature/x', 'f')],
        tags: [],
        settings: settingsFor('git-flow')
      })
      const traced = new BranchTracer(index, candidates, remotes).traceAll()

      const { branches, commits } = BranchConsolidator.consolidate(index, candidates, traced)

      // The real feature/x ref claimed f before the merge-derived candidate
      expect(branches.map((branch) => [branch.name, branch.isMerged])).toEqual([
        ['main', false],
        ['feature/x', false]
      ])
      expect(commits.map((commit) => commit.owner)).toEqual([0, 1, 0, 0])
      expect(commits[1].branches).toEqual([1])
    })

    it('filters unowned commits and remaps positions', () => {
      const settings = { ...settingsFor('git-flow'), includeRemote: false }
      const index = CommitIndex.build([rawCommit('r', ['a']), rawCommit('a')])
      const { candidates, remotes } = BranchCatalogBuilder.build({
        index,
        branches: [localBranch('main', 'a'), remoteBranch('origin/feature', 'r')],
        tags: [],
        settings
      })
      const traced = new BranchTracer(index, candidates, remotes).traceAll()

      const { branches, commits, indices } = BranchConsolidator.consolidate(
        index,
        candidates,
        traced
      )

      expect(commits.map((commit) => commit.sha)).toEqual(['a'])
      expect(indices.get('a')).toBe(0)
      expect(indices.has('r')).toBe(false)
      expect(branches[0].range).toEqual({ start: 0, end: 0 })
    })

    it('drops candidates that were never traced', () => {
      const index = CommitIndex.build([rawCommit('a')])
      const { candidates, remotes } = BranchCatalogBuilder.build({
        index,
        branches: [localBranch('main', 'a'), localBranch('stale', 'elsewhere')],
        tags: [],
        settings: settingsFor('git-flow')
      })
      const traced = new BranchTracer(index, candidates, remotes).traceAll()

      const { branches } = BranchConsolidator.consolidate(index, candidates, traced)

      expect(branches.map((branch) => branch.name)).toEqual(['main'])
    })
  })

  describe('remapRange', () => {
    const positionMap = [0, null, 1, null, 2]

    it('moves a dropped start forward and a dropped end back', () => {
      expect(BranchConsolidator.remapRange({ start: 1, end: 3 }, positionMap)).toEqual({
        start: 1,
        end: 1
      })
    })

    it('keeps open bounds open', () => {
      expect(BranchConsolidator.remapRange({ start: null, end: 4 }, positionMap)).toEqual({
        start: null,
        end: 2
      })
      expect(BranchConsolidator.remapRange({ start: 3, end: null }, positionMap)).toEqual({
        start: 2,
        end: null
      })
    })

    it('invalidates a range without surviving commits', () => {
      expect(BranchConsolidator.remapRange({ start: 1, end: 1 }, positionMap)).toEqual({
        start: null,
        end: null
      })
      expect(BranchConsolidator.remapRange({ start: 1, end: null }, [0, null])).toEqual({
        start: null,
        end: null
      })
    })
  })
})
