/**
 * ColumnAllocator - Places branch lines in non-overlapping columns.
 *
 * Columns are allocated per position group. A branch takes the first column of
 * its group whose occupied intervals do not overlap its range, except the
 * column of the line it merges into, so the two never meet head-on at the
 * merge commit. Group offsets then make columns globally unique.
 */

import { log } from '@shared/logger'
import type { BranchOrder, BranchRecord, CommitNode, GraphSettings } from '@shared/types'

export type AllocatorGraph = {
  commits: CommitNode[]
  indices: ReadonlyMap<string, number>
}

type Interval = { start: number; end: number }

type SortEntry = {
  branchIndex: number
  start: number
  end: number
  groupHint: number
  lengthKey: number
  startKey: number
}

export class ColumnAllocator {
  // Prevent instantiation - use static methods
  private constructor() {}

  public static allocate(
    graph: AllocatorGraph,
    branches: BranchRecord[],
    settings: GraphSettings
  ): void {
    // One group per order pattern, plus one for unmatched names
    const groupCount = settings.branches.order.length + 1
    const occupied: Interval[][][] = Array.from({ length: groupCount }, () => [])
    const entries = ColumnAllocator.sortEntries(graph, branches, settings.branchOrder)

    for (const entry of entries) {
      const branch = branches[entry.branchIndex]
      const group = branch.visual.orderGroup
      const columns = occupied[group]
      const blockedColumn = ColumnAllocator.mergeTargetColumn(graph, branches, branch)

      let selected = columns.findIndex(
        (intervals, column) =>
          column !== blockedColumn &&
          !intervals.some((interval) => entry.start <= interval.end && entry.end >= interval.start)
      )
      if (selected === -1) {
        selected = columns.length
        columns.push([])
      }

      columns[selected].push({ start: entry.start, end: entry.end })
      branch.visual.column = selected
    }

    const offsets: number[] = []
    let running = 0
    for (const group of occupied) {
      offsets.push(running)
      running += group.length
    }

    for (const branch of branches) {
      if (branch.visual.column !== null) {
        branch.visual.column += offsets[branch.visual.orderGroup]
      }
    }

    log.debug(`[ColumnAllocator] ${entries.length} branches placed in ${running} columns`)
  }

  private static sortEntries(
    graph: AllocatorGraph,
    branches: BranchRecord[],
    order: BranchOrder
  ): SortEntry[] {
    const lengthFactor = order.kind === 'shortest-first' ? 1 : -1
    const startFactor = order.forward ? 1 : -1
    const defaultEnd = Math.max(graph.commits.length - 1, 0)

    const entries: SortEntry[] = []
    branches.forEach((branch, branchIndex) => {
      const { range, visual } = branch
      if (range.start === null && range.end === null) return

      const start = range.start ?? 0
      const end = range.end ?? defaultEnd
      const source = visual.sourceOrderGroup ?? visual.orderGroup
      const target = visual.targetOrderGroup ?? visual.orderGroup

      entries.push({
        branchIndex,
        start,
        end,
        groupHint: Math.max(source, target),
        lengthKey: (end - start) * lengthFactor,
        startKey: start * startFactor
      })
    })

    return entries.sort(
      (a, b) => a.groupHint - b.groupHint || a.lengthKey - b.lengthKey || a.startKey - b.startKey
    )
  }

  /**
   * Column currently held, in the same group, by the line owning this
   * branch's merge commit.
   */
  private static mergeTargetColumn(
    graph: AllocatorGraph,
    branches: BranchRecord[],
    branch: BranchRecord
  ): number | null {
    if (branch.mergeTargetSha === null) return null
    const position = graph.indices.get(branch.mergeTargetSha)
    if (position === undefined) return null
    const owner = graph.commits[position].owner
    if (owner === null) return null
    const mergeBranch = branches[owner]
    return mergeBranch.visual.orderGroup === branch.visual.orderGroup
      ? mergeBranch.visual.column
      : null
  }
}
