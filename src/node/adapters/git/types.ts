/**
 * Git Adapter Types
 *
 * Options and intermediate shapes for reading a repository snapshot,
 * independent of the underlying Git implementation.
 */

/**
 * Options for reading commit history
 */
export type HistoryOptions = {
  /**
   * Maximum number of commits to read
   * Undefined means the whole history
   */
  maxCount?: number
}

/**
 * Options for listing branch refs
 */
export type BranchRefOptions = {
  /**
   * Include refs/remotes/* alongside refs/heads/*
   */
  includeRemote?: boolean
}

/**
 * Options for reading a complete snapshot
 */
export type SnapshotOptions = HistoryOptions & BranchRefOptions
