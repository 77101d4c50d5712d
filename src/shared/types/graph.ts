// ============================================================================
// Repository snapshot (input)
// ============================================================================

export type CommitPerson = {
  name: string
  email: string
  timeMs: number
}

/**
 * A commit as read from the repository, before any layout work.
 */
export type RawCommit = {
  sha: string
  /** Ordered parent SHAs. The first parent is the line the commit was made on. */
  parentShas: string[]
  /** First line of the commit message. */
  summary: string
  author: CommitPerson
  committer: CommitPerson
}

export type RawBranchRef = {
  /** Full ref name, e.g. refs/heads/main or refs/remotes/origin/main */
  fullRef: string
  targetSha: string
  isRemote: boolean
}

export type RawTagRef = {
  /** Full ref name, e.g. refs/tags/v1.0.0 */
  fullRef: string
  /** Commit the tag points at, dereferenced once for annotated tags. */
  targetSha: string
}

export type RawHead = {
  /** refs/heads/<name>, or the literal HEAD when detached */
  fullRef: string
  sha: string
  isBranch: boolean
}

/**
 * Everything the graph builder needs, fully materialised.
 * Commits are in topological order, newest first.
 */
export type RepositorySnapshot = {
  commits: RawCommit[]
  branches: RawBranchRef[]
  tags: RawTagRef[]
  head: RawHead
  /** Commits hidden from the graph, e.g. stashes. */
  excludedShas: string[]
}

// ============================================================================
// Graph (output)
// ============================================================================

export type CommitNode = {
  sha: string
  isMerge: boolean
  /** At most two parents; the first parent is significant. */
  parentShas: string[]
  childShas: string[]
  /** Indices of real branches whose tip is this commit. */
  branches: number[]
  /** Indices of tags pointing at this commit. */
  tags: number[]
  /** Index of the branch that introduced this commit. */
  owner: number | null
  summary: string
  author: CommitPerson
  committer: CommitPerson
}

/**
 * Inclusive span of sequence positions a branch covers.
 * `start` is the newest position, `end` the oldest. A `null` bound is open to
 * that end of history; both `null` means the branch has no range.
 */
export type BranchRange = {
  start: number | null
  end: number | null
}

export type BranchVisual = {
  /** Position group, left to right. */
  orderGroup: number
  /** Group of the branch this branch originates from. */
  sourceOrderGroup: number | null
  /** Group of the branch this branch merges into. */
  targetOrderGroup: number | null
  /** Index in the 256-color terminal palette. */
  termColor: number
  /** Color name or hex value for vector output. */
  svgColor: string
  column: number | null
}

export type BranchRecord = {
  targetSha: string
  /** The merge commit a merge-derived branch was reconstructed from. */
  mergeTargetSha: string | null
  name: string
  persistence: number
  isRemote: boolean
  /** Reconstructed from a merge commit summary rather than a ref. */
  isMerged: boolean
  isTag: boolean
  visual: BranchVisual
  range: BranchRange
}

export type HeadInfo = {
  sha: string
  /** Branch name without refs/heads/, or HEAD when detached. */
  name: string
  isBranch: boolean
}

export type SkippedReference = {
  ref: string
  reason: 'malformed' | 'encoding'
  message: string
}

export type GitGraph = {
  commits: CommitNode[]
  indices: ReadonlyMap<string, number>
  allBranches: BranchRecord[]
  /** Indices into allBranches of everything that is not a tag. */
  branches: number[]
  /** Indices into allBranches of tags. */
  tags: number[]
  head: HeadInfo
  skippedReferences: SkippedReference[]
}
