import { log } from '@shared/logger'
import type { BranchRecord, BranchRange, GitGraph } from '@shared/types'

export function printGraph(graph: GitGraph): void {
  const headLabel = graph.head.isBranch ? graph.head.name : `${graph.head.name} (detached)`
  log.debug(`\nHEAD: ${headLabel} -> ${graph.head.sha || 'unknown'}`)

  log.debug(`\nBranches (${graph.branches.length}):`)
  graph.branches.forEach((branchIndex) => printBranch(graph.allBranches[branchIndex]))

  log.debug(`\nTags (${graph.tags.length}):`)
  graph.tags.forEach((tagIndex) => printBranch(graph.allBranches[tagIndex]))

  log.debug(`\nCommits (${graph.commits.length}):`)
  graph.commits.forEach((commit, position) => {
    const owner = commit.owner === null ? null : graph.allBranches[commit.owner]
    const column = owner?.visual.column ?? '-'
    const refs = [...commit.branches, ...commit.tags].map(
      (branchIndex) => graph.allBranches[branchIndex].name
    )
    const refLabel = refs.length > 0 ? ` (${refs.join(', ')})` : ''
    log.debug(
      `  ${String(position).padStart(4)} ${commit.sha.slice(0, 7)} [${column}] ${owner?.name ?? '(none)'}${refLabel} ${commit.summary}`
    )
  })

  if (graph.skippedReferences.length > 0) {
    log.debug(`\nSkipped references (${graph.skippedReferences.length}):`)
    graph.skippedReferences.forEach((skipped) => {
      log.debug(`  - ${skipped.ref} [${skipped.reason}] ${skipped.message}`)
    })
  }
}

function printBranch(branch: BranchRecord): void {
  const kind = branch.isTag ? 'tag' : branch.isMerged ? 'merged' : branch.isRemote ? 'remote' : 'local'
  const { visual } = branch
  log.debug(
    `  - ${branch.name} [${kind}] range ${formatRange(branch.range)}, group ${visual.orderGroup}, column ${visual.column ?? '-'}, colors ${visual.termColor}/${visual.svgColor}`
  )
}

export function formatRange(range: BranchRange): string {
  if (range.start === null && range.end === null) return '(none)'
  return `[${range.start ?? 'open'}, ${range.end ?? 'open'}]`
}
