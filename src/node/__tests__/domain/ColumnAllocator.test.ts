import type { BranchOrder, GraphSettings } from '@shared/types'
import { describe, expect, it } from 'vitest'
import { ColumnAllocator } from '../../domain'
import { createRecord, indicesOf, ownedCommits, settingsFor } from '../helpers/graph-fixtures'

function withOrder(settings: GraphSettings, branchOrder: BranchOrder): GraphSettings {
  return { ...settings, branchOrder }
}

describe('ColumnAllocator', () => {
  const flat = settingsFor('none')
  const commits = ownedCommits([0, 0, 0, 0])
  const graph = { commits, indices: indicesOf(commits) }

  it('shares a column between branches with disjoint ranges', () => {
    const branches = [
      createRecord('a', { range: { start: 0, end: 1 } }),
      createRecord('b', { range: { start: 2, end: 3 } })
    ]

    ColumnAllocator.allocate(graph, branches, flat)

    expect(branches.map((branch) => branch.visual.column)).toEqual([0, 0])
  })

  it('opens a new column for overlapping ranges', () => {
    const branches = [
      createRecord('a', { range: { start: 0, end: 2 } }),
      createRecord('b', { range: { start: 2, end: 3 } })
    ]

    ColumnAllocator.allocate(graph, branches, flat)

    // b is shorter and placed first
    expect(branches.map((branch) => branch.visual.column)).toEqual([1, 0])
  })

  it('places short ranges first unless told otherwise', () => {
    const shortestFirst = [
      createRecord('long', { range: { start: 0, end: 3 } }),
      createRecord('short', { range: { start: 1, end: 1 } })
    ]
    ColumnAllocator.allocate(graph, shortestFirst, flat)
    expect(shortestFirst.map((branch) => branch.visual.column)).toEqual([1, 0])

    const longestFirst = [
      createRecord('long', { range: { start: 0, end: 3 } }),
      createRecord('short', { range: { start: 1, end: 1 } })
    ]
    ColumnAllocator.allocate(
      graph,
      longestFirst,
      withOrder(flat, { kind: 'longest-first', forward: true })
    )
    expect(longestFirst.map((branch) => branch.visual.column)).toEqual([0, 1])
  })

  it('orders equal lengths by start, backwards when not forward', () => {
    const backward = [
      createRecord('early', { range: { start: 0, end: 1 } }),
      createRecord('late', { range: { start: 1, end: 2 } })
    ]

    ColumnAllocator.allocate(
      graph,
      backward,
      withOrder(flat, { kind: 'shortest-first', forward: false })
    )

    expect(backward.map((branch) => branch.visual.column)).toEqual([1, 0])
  })

  it('avoids the column of the line it merges into', () => {
    const mergeCommits = ownedCommits([0, 0, 1, 1])
    const mergeGraph = { commits: mergeCommits, indices: indicesOf(mergeCommits) }
    const branches = [
      createRecord('main', { range: { start: 0, end: 0 } }),
      createRecord('topic', { range: { start: 2, end: 3 }, mergeTargetSha: 'c0' })
    ]

    ColumnAllocator.allocate(mergeGraph, branches, flat)

    // Without the merge target, topic would fit beside main in column 0
    expect(branches.map((branch) => branch.visual.column)).toEqual([0, 1])
  })

  it('ignores a merge target in another position group', () => {
    const settings = settingsFor('simple')
    const mergeCommits = ownedCommits([0, 0, 1, 1])
    const mergeGraph = { commits: mergeCommits, indices: indicesOf(mergeCommits) }
    const branches = [
      createRecord('main', { range: { start: 0, end: 0 }, visual: { orderGroup: 1 } }),
      createRecord('topic', {
        range: { start: 2, end: 3 },
        mergeTargetSha: 'c0',
        visual: { orderGroup: 2 }
      }),
      createRecord('feature', { range: { start: 0, end: 1 }, visual: { orderGroup: 2 } })
    ]

    ColumnAllocator.allocate(mergeGraph, branches, settings)

    // topic and feature share the single column of group 2, after main's group
    expect(branches.map((branch) => branch.visual.column)).toEqual([0, 1, 1])
  })

  it('places branches with a lower group hint first', () => {
    const settings = settingsFor('simple')
    const branches = [
      createRecord('main', {
        range: { start: 0, end: 1 },
        visual: { orderGroup: 1, targetOrderGroup: 2 }
      }),
      createRecord('trunk', { range: { start: 0, end: 3 }, visual: { orderGroup: 1 } })
    ]

    ColumnAllocator.allocate(graph, branches, settings)

    // trunk's hint is 1 and main's is 2, so the longer trunk takes column 0
    expect(branches.map((branch) => branch.visual.column)).toEqual([1, 0])
  })

  it('offsets columns by the width of preceding groups', () => {
    const settings = settingsFor('simple')
    const branches = [
      createRecord('tags/v1', { range: { start: 0, end: 0 }, visual: { orderGroup: 0 } }),
      createRecord('main', { range: { start: 0, end: 3 }, visual: { orderGroup: 1 } }),
      createRecord('x', { range: { start: 0, end: 1 }, visual: { orderGroup: 2 } }),
      createRecord('y', { range: { start: 0, end: 2 }, visual: { orderGroup: 2 } })
    ]

    ColumnAllocator.allocate(graph, branches, settings)

    expect(branches.map((branch) => branch.visual.column)).toEqual([0, 1, 2, 3])
  })

  it('treats open bounds as the ends of history and skips empty ranges', () => {
    const branches = [
      createRecord('open', { range: { start: null, end: null } }),
      createRecord('tail', { range: { start: 2, end: null } }),
      createRecord('head', { range: { start: null, end: 2 } })
    ]

    ColumnAllocator.allocate(graph, branches, flat)

    expect(branches.map((branch) => branch.visual.column)).toEqual([null, 0, 1])
  })
})
