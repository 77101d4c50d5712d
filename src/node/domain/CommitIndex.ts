/**
 * CommitIndex - Ordered commit arena with an immutable id -> position table.
 *
 * Positions follow the input order (topological, newest first). Children are
 * derived once while building. The only mutable slot is each commit's owner,
 * which can be written exactly once.
 */

import { log } from '@shared/logger'
import type { CommitNode, RawCommit } from '@shared/types'
import { AppError, StructuralAccessError } from '../shared/errors'

export type CommitIndexOptions = {
  /** Commits to leave out entirely, e.g. stashes. */
  excludedShas?: Iterable<string>
  /** Keep at most this many commits (after exclusion). */
  maxCount?: number
}

export class CommitIndex {
  private constructor(
    public readonly commits: CommitNode[],
    private readonly positions: ReadonlyMap<string, number>
  ) {}

  public static build(rawCommits: RawCommit[], options: CommitIndexOptions = {}): CommitIndex {
    const excluded = new Set(options.excludedShas ?? [])
    const commits: CommitNode[] = []
    const positions = new Map<string, number>()

    for (const raw of rawCommits) {
      if (options.maxCount !== undefined && commits.length >= options.maxCount) break
      if (excluded.has(raw.sha)) continue
      if (positions.has(raw.sha)) {
        throw new StructuralAccessError(`Commit ${raw.sha} appears twice in history`, raw.sha)
      }

      positions.set(raw.sha, commits.length)
      commits.push({
        sha: raw.sha,
        isMerge: raw.parentShas.length > 1,
        parentShas: raw.parentShas.slice(0, 2),
        childShas: [],
        branches: [],
        tags: [],
        owner: null,
        summary: raw.summary,
        author: raw.author,
        committer: raw.committer
      })
    }

    for (const commit of commits) {
      for (const parentSha of commit.parentShas) {
        const parentPosition = positions.get(parentSha)
        if (parentPosition !== undefined) {
          commits[parentPosition].childShas.push(commit.sha)
        }
      }
    }

    log.debug(`[CommitIndex] Indexed ${commits.length} of ${rawCommits.length} commits`)
    return new CommitIndex(commits, positions)
  }

  public get size(): number {
    return this.commits.length
  }

  public indexOf(sha: string): number | undefined {
    return this.positions.get(sha)
  }

  /**
   * Position of a commit that must be indexed.
   */
  public require(sha: string): number {
    const position = this.positions.get(sha)
    if (position === undefined) {
      throw new StructuralAccessError(`Commit ${sha} is not part of the indexed history`, sha)
    }
    return position
  }

  public at(position: number): CommitNode {
    const commit = this.commits[position]
    if (commit === undefined) {
      throw new StructuralAccessError(
        `No commit at position ${position} (history has ${this.commits.length})`
      )
    }
    return commit
  }

  /**
   * Records the branch that introduced a commit. Ownership is write-once.
   */
  public assignOwner(position: number, branch: number): void {
    const commit = this.at(position)
    if (commit.owner !== null) {
      throw new AppError(
        `Commit ${commit.sha} is already owned by branch ${commit.owner}, cannot assign ${branch}`
      )
    }
    commit.owner = branch
  }
}
