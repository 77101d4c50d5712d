/**
 * GraphBuilder - Runs the layout pipeline over a repository snapshot.
 *
 * index -> catalog -> trace -> consolidate -> resolve hints -> allocate columns
 *
 * Every stage completes before the next one starts. The result is complete or
 * construction throws; there is no partial graph.
 */

import { log } from '@shared/logger'
import type { GitGraph, GraphSettings, HeadInfo, RawHead, RepositorySnapshot } from '@shared/types'
import { BranchCatalogBuilder, LOCAL_BRANCH_PREFIX } from './BranchCatalogBuilder'
import { BranchConsolidator } from './BranchConsolidator'
import { BranchTracer } from './BranchTracer'
import { ColumnAllocator } from './ColumnAllocator'
import { CommitIndex } from './CommitIndex'
import { SourceTargetResolver } from './SourceTargetResolver'

export type GraphBuildOptions = {
  /** Upstream cutoff: only the newest `maxCount` commits are laid out. */
  maxCount?: number
}

export class GraphBuilder {
  // Prevent instantiation - use static methods
  private constructor() {}

  public static build(
    snapshot: RepositorySnapshot,
    settings: GraphSettings,
    options: GraphBuildOptions = {}
  ): GitGraph {
    const head = GraphBuilder.readHead(snapshot.head)

    const index = CommitIndex.build(snapshot.commits, {
      excludedShas: snapshot.excludedShas,
      maxCount: options.maxCount
    })

    const { candidates, skipped, remotes } = BranchCatalogBuilder.build({
      index,
      branches: snapshot.branches,
      tags: snapshot.tags,
      settings
    })

    const traced = new BranchTracer(index, candidates, remotes).traceAll()
    const { commits, indices, branches } = BranchConsolidator.consolidate(index, candidates, traced)

    SourceTargetResolver.resolve({ commits, indices }, branches)
    ColumnAllocator.allocate({ commits, indices }, branches, settings)

    const branchIndices: number[] = []
    const tagIndices: number[] = []
    branches.forEach((branch, branchIndex) => {
      if (branch.isTag) {
        tagIndices.push(branchIndex)
      } else {
        branchIndices.push(branchIndex)
      }
    })

    log.debug(
      `[GraphBuilder] ${commits.length} commits, ${branchIndices.length} branches, ${tagIndices.length} tags`
    )

    return {
      commits,
      indices,
      allBranches: branches,
      branches: branchIndices,
      tags: tagIndices,
      head,
      skippedReferences: skipped
    }
  }

  /**
   * HEAD as shown to the renderer: the branch name, or HEAD when detached.
   */
  public static readHead(raw: RawHead): HeadInfo {
    const name =
      raw.fullRef !== 'HEAD' && raw.fullRef.startsWith(LOCAL_BRANCH_PREFIX)
        ? raw.fullRef.slice(LOCAL_BRANCH_PREFIX.length)
        : raw.fullRef
    return { sha: raw.sha, name, isBranch: raw.isBranch }
  }
}
