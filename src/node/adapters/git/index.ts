/**
 * Git Adapter Module
 *
 * Read-only repository access for the graph builder.
 *
 * Usage:
 * ```typescript
 * import { getGitAdapter } from './adapters/git'
 *
 * const git = getGitAdapter()
 * const snapshot = await git.readSnapshot(repoPath, { maxCount: 500 })
 * ```
 */

export { createGitAdapter, getGitAdapter, resetGitAdapter, setGitAdapter } from './factory'
export type { GitAdapterConfig, GitAdapterType } from './factory'

export type { GitAdapter } from './interface'

export type { BranchRefOptions, HistoryOptions, SnapshotOptions } from './types'

export {
  parseBranchRefs,
  parseHead,
  parseLogOutput,
  parseShaList,
  parseTagRefs
} from './parsers'

// Adapter implementations (for testing)
export { SimpleGitAdapter } from './SimpleGitAdapter'
