import { log } from '@shared/logger'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { GraphBuilder } from '../../../domain'
import {
  createSnapshot,
  localBranch,
  rawCommit,
  settingsFor,
  tag
} from '../../../__tests__/helpers/graph-fixtures'
import { formatRange, printGraph } from '../print-graph'

describe('printGraph', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('logs branches, tags and commits at debug level', () => {
    const graph = GraphBuilder.build(
      createSnapshot(
        [rawCommit('c2', ['c1'], 'Second'), rawCommit('c1', [], 'First')],
        [localBranch('main', 'c2')],
        { tags: [tag('v1', 'c1')] }
      ),
      settingsFor('git-flow')
    )

    const lines: unknown[] = []
    vi.spyOn(log, 'debug').mockImplementation((message: unknown) => {
      lines.push(message)
    })

    printGraph(graph)

    expect(lines).toEqual([
      '\nHEAD: main -> c2',
      '\nBranches (1):',
      '  - main [local] range [0, 1], group 0, column 0, colors 12/blue',
      '\nTags (1):',
      '  - tags/v1 [tag] range (none), group 3, column -, colors 10/green',
      '\nCommits (2):',
      '     0 c2 [0] main (main) Second',
      '     1 c1 [0] main (tags/v1) First'
    ])
  })
})

describe('formatRange', () => {
  it('marks open and missing bounds', () => {
    expect(formatRange({ start: null, end: null })).toBe('(none)')
    expect(formatRange({ start: 2, end: null })).toBe('[2, open]')
    expect(formatRange({ start: null, end: 4 })).toBe('[open, 4]')
  })
})
