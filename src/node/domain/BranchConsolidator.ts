/**
 * BranchConsolidator - Drops empty candidates and compacts all indices.
 *
 * After tracing, merge-derived candidates that own nothing were fully absorbed
 * by another line and disappear. Survivors are renumbered contiguously, and the
 * commit sequence is reduced to owned commits with every position rewritten.
 */

import { log } from '@shared/logger'
import type { BranchRange, BranchRecord, CommitNode } from '@shared/types'
import { StructuralAccessError } from '../shared/errors'
import type { CommitIndex } from './CommitIndex'

export type ConsolidatedGraph = {
  commits: CommitNode[]
  indices: ReadonlyMap<string, number>
  branches: BranchRecord[]
}

export class BranchConsolidator {
  // Prevent instantiation - use static methods
  private constructor() {}

  /**
   * @param traced - per candidate, whether its tip was indexed and traced
   */
  public static consolidate(
    index: CommitIndex,
    candidates: BranchRecord[],
    traced: boolean[]
  ): ConsolidatedGraph {
    const ownedCounts = new Array<number>(candidates.length).fill(0)
    for (const commit of index.commits) {
      if (commit.owner !== null) ownedCounts[commit.owner]++
    }

    const branchMap: Array<number | null> = []
    const branches: BranchRecord[] = []
    candidates.forEach((candidate, oldIndex) => {
      const absorbed = candidate.isMerged && !candidate.isTag && ownedCounts[oldIndex] === 0
      if (!traced[oldIndex] || absorbed) {
        branchMap.push(null)
        return
      }
      branchMap.push(branches.length)
      branches.push(candidate)
    })

    const remapBranch = (oldIndex: number): number => {
      const mapped = branchMap[oldIndex]
      if (mapped === null || mapped === undefined) {
        throw new StructuralAccessError(`Branch ${oldIndex} was dropped but is still referenced`)
      }
      return mapped
    }

    const positionMap: Array<number | null> = []
    const commits: CommitNode[] = []
    const indices = new Map<string, number>()
    for (const commit of index.commits) {
      if (commit.owner === null) {
        positionMap.push(null)
        continue
      }
      positionMap.push(commits.length)
      indices.set(commit.sha, commits.length)
      commits.push({
        ...commit,
        owner: remapBranch(commit.owner),
        branches: commit.branches.map(remapBranch),
        tags: commit.tags.map(remapBranch)
      })
    }

    for (const branch of branches) {
      branch.range = BranchConsolidator.remapRange(branch.range, positionMap)
    }

    log.debug(
      `[BranchConsolidator] Kept ${branches.length} of ${candidates.length} branches, ${commits.length} of ${index.size} commits`
    )

    return { commits, indices, branches }
  }

  /**
   * Re-expresses a range against the filtered sequence. A start on a dropped
   * commit moves forward to the next survivor, an end moves back.
   */
  public static remapRange(range: BranchRange, positionMap: Array<number | null>): BranchRange {
    let start: number | null = null
    let end: number | null = null

    if (range.start !== null) {
      let position = range.start
      while (position < positionMap.length && positionMap[position] === null) position++
      if (position >= positionMap.length) return { start: null, end: null }
      start = positionMap[position]
    }

    if (range.end !== null) {
      let position = Math.min(range.end, positionMap.length - 1)
      while (position >= 0 && positionMap[position] === null) position--
      if (position < 0) return { start: null, end: null }
      end = positionMap[position]
    }

    if (start !== null && end !== null && start > end) {
      return { start: null, end: null }
    }
    return { start, end }
  }
}
