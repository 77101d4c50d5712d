/**
 * Git Adapter Interface
 *
 * Defines the read-only repository access the graph builder depends on.
 * Implementations shell out to a Git backend; the domain layer never does.
 */

import type {
  RawBranchRef,
  RawCommit,
  RawHead,
  RawTagRef,
  RepositorySnapshot
} from '@shared/types'
import type { BranchRefOptions, HistoryOptions, SnapshotOptions } from './types'

/**
 * Main Git adapter interface
 *
 * All methods are async and throw GitError on failure
 */
export interface GitAdapter {
  /**
   * Get the adapter name for logging/debugging
   */
  readonly name: string

  /**
   * Read every commit reachable from any ref
   *
   * @param dir - Repository directory path
   * @returns Commits in topological order, newest first
   */
  readHistory(dir: string, options?: HistoryOptions): Promise<RawCommit[]>

  /**
   * List branch refs with their targets, skipping symbolic refs
   *
   * @param dir - Repository directory path
   */
  listBranchRefs(dir: string, options?: BranchRefOptions): Promise<RawBranchRef[]>

  /**
   * List tag refs, dereferencing annotated tags once
   *
   * @param dir - Repository directory path
   */
  listTagRefs(dir: string): Promise<RawTagRef[]>

  /**
   * Read the current HEAD
   *
   * @param dir - Repository directory path
   */
  readHead(dir: string): Promise<RawHead>

  /**
   * List stash commit SHAs, which are hidden from the graph
   *
   * @param dir - Repository directory path
   */
  listStashShas(dir: string): Promise<string[]>

  /**
   * Read everything the graph builder needs in one go
   *
   * @param dir - Repository directory path
   */
  readSnapshot(dir: string, options?: SnapshotOptions): Promise<RepositorySnapshot>
}
