/**
 * SourceTargetResolver - Layout hints for column allocation.
 *
 * For every branch, finds the position group of the line it forks from
 * (source) and the line it merges into (target). Hints only affect the order
 * in which branches are given columns.
 */

import type { BranchRecord, CommitNode } from '@shared/types'

export type ResolverGraph = {
  commits: CommitNode[]
  indices: ReadonlyMap<string, number>
}

export class SourceTargetResolver {
  // Prevent instantiation - use static methods
  private constructor() {}

  public static resolve(graph: ResolverGraph, branches: BranchRecord[]): void {
    const branchCommits: number[][] = branches.map(() => [])
    graph.commits.forEach((commit, position) => {
      if (commit.owner !== null) branchCommits[commit.owner].push(position)
    })

    branches.forEach((branch, branchIndex) => {
      const owned = branchCommits[branchIndex]
      branch.visual.sourceOrderGroup = SourceTargetResolver.sourceGroup(
        graph,
        branches,
        branchIndex,
        owned
      )
      branch.visual.targetOrderGroup = SourceTargetResolver.targetGroup(
        graph,
        branches,
        branchIndex,
        owned
      )
    })
  }

  /**
   * Group of the first foreign parent, scanning from the oldest owned commit.
   */
  private static sourceGroup(
    graph: ResolverGraph,
    branches: BranchRecord[],
    branchIndex: number,
    owned: number[]
  ): number | null {
    for (let i = owned.length - 1; i >= 0; i--) {
      const commit = graph.commits[owned[i]]
      for (const parentSha of commit.parentShas) {
        const owner = SourceTargetResolver.ownerOf(graph, parentSha)
        if (owner !== null && owner !== branchIndex) {
          return branches[owner].visual.orderGroup
        }
      }
    }
    return null
  }

  /**
   * Group of the line owning the merge commit, or else of the first foreign
   * child of the branch tip.
   */
  private static targetGroup(
    graph: ResolverGraph,
    branches: BranchRecord[],
    branchIndex: number,
    owned: number[]
  ): number | null {
    const { mergeTargetSha } = branches[branchIndex]
    if (mergeTargetSha !== null) {
      const owner = SourceTargetResolver.ownerOf(graph, mergeTargetSha)
      if (owner !== null && owner !== branchIndex) {
        return branches[owner].visual.orderGroup
      }
    }

    if (owned.length === 0) return null
    for (const childSha of graph.commits[owned[0]].childShas) {
      const owner = SourceTargetResolver.ownerOf(graph, childSha)
      if (owner !== null && owner !== branchIndex) {
        return branches[owner].visual.orderGroup
      }
    }
    return null
  }

  private static ownerOf(graph: ResolverGraph, sha: string): number | null {
    const position = graph.indices.get(sha)
    return position === undefined ? null : graph.commits[position].owner
  }
}
