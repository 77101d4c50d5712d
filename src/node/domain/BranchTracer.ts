/**
 * BranchTracer - Assigns commits to branch lines.
 *
 * Candidates are traced in catalog order. Each trace walks first parents from
 * the candidate's tip and claims every commit nobody owns yet, so the most
 * persistent lines claim shared history before feature and merge-derived lines.
 *
 * When a walk runs into an owned commit it stops. A walk that meets an earlier
 * candidate of the same name refines that candidate's range instead; this is
 * the only write to a record other than the one being traced.
 */

import { log } from '@shared/logger'
import type { BranchRecord } from '@shared/types'
import { StructuralAccessError } from '../shared/errors'
import { BranchPatterns } from './BranchPatterns'
import type { CommitIndex } from './CommitIndex'

export class BranchTracer {
  constructor(
    private readonly index: CommitIndex,
    private readonly branches: BranchRecord[],
    private readonly remotes: ReadonlySet<string>
  ) {}

  /**
   * Traces every candidate whose tip is part of the indexed history.
   * Returns, per candidate, whether it was traced at all.
   */
  public traceAll(): boolean[] {
    let claimedCount = 0

    const traced = this.branches.map((branch, branchIndex) => {
      const position = this.index.indexOf(branch.targetSha)
      if (position === undefined) return false

      const commit = this.index.at(position)
      if (branch.isTag) {
        commit.tags.push(branchIndex)
      } else if (!branch.isMerged) {
        commit.branches.push(branchIndex)
      }

      if (this.trace(branchIndex)) claimedCount++
      return true
    })

    log.debug(
      `[BranchTracer] Traced ${traced.filter(Boolean).length} of ${this.branches.length} candidates, ${claimedCount} claimed commits`
    )
    return traced
  }

  /**
   * Walks first parents from the candidate's tip, claiming unowned commits.
   * Returns whether any commit was newly claimed.
   */
  public trace(branchIndex: number): boolean {
    const branch = this.branches[branchIndex]
    let position: number | undefined = this.index.require(branch.targetSha)
    let previous: number | null = null
    let boundary: number | null = null
    let claimed = false

    while (position !== undefined) {
      const commit = this.index.at(position)

      if (commit.owner !== null) {
        const owner = this.branches[commit.owner]

        if (owner.name === branch.name && (branch.range.start ?? 0) <= (owner.range.start ?? 0)) {
          this.refineRange(owner, position)
          boundary = position - 1
        } else {
          if (BranchPatterns.isRemoteTrackingOf(branch.name, owner.name, this.remotes)) {
            branch.visual.termColor = owner.visual.termColor
            branch.visual.svgColor = owner.visual.svgColor
          }
          boundary = this.mergeBoundary(previous, position)
        }
        break
      }

      this.index.assignOwner(position, branchIndex)
      claimed = true

      if (commit.parentShas.length === 0) {
        boundary = position
        break
      }

      previous = position
      position = this.index.indexOf(commit.parentShas[0])
    }

    this.closeRange(branch, boundary)
    return claimed
  }

  /**
   * The same logical line traced further back: move the earlier record's start
   * to this position, or drop its range when the position lies past its end.
   */
  private refineRange(owner: BranchRecord, position: number): void {
    if (owner.range.end !== null && position > owner.range.end) {
      owner.range = { start: null, end: null }
    } else {
      owner.range = { start: position, end: owner.range.end }
    }
  }

  /**
   * Oldest position of a line that merges into an owned commit.
   *
   * When the last claimed commit is a merge, the line extends to the furthest
   * sibling among the owned commit's children so it is not cut short while
   * another line still passes beside it.
   */
  private mergeBoundary(previous: number | null, ownedPosition: number): number {
    if (previous === null || !this.index.at(previous).isMerge) {
      return ownedPosition - 1
    }

    let boundary = previous
    for (const childSha of this.index.at(ownedPosition).childShas) {
      const sibling = this.index.indexOf(childSha)
      if (sibling === undefined) {
        throw new StructuralAccessError(
          `Child ${childSha} of ${this.index.at(ownedPosition).sha} is not indexed`,
          childSha
        )
      }
      boundary = Math.max(boundary, sibling)
    }
    return boundary
  }

  private closeRange(branch: BranchRecord, boundary: number | null): void {
    const { start } = branch.range
    if (start === null) {
      branch.range = { start: null, end: boundary !== null && boundary >= 0 ? boundary : null }
    } else if (boundary === null) {
      branch.range = { start, end: null }
    } else if (boundary < start) {
      branch.range = { start: null, end: null }
    } else {
      branch.range = { start, end: boundary }
    }
  }
}
