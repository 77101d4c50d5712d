/**
 * Simple-Git Adapter
 *
 * Git adapter implementation using simple-git library.
 * This uses the native Git CLI under the hood; every read is a single
 * plumbing command with a machine-readable format.
 */

import { log } from '@shared/logger'
import type {
  RawBranchRef,
  RawCommit,
  RawHead,
  RawTagRef,
  RepositorySnapshot
} from '@shared/types'
import simpleGit, { type SimpleGit } from 'simple-git'
import { GitError } from '../../shared/errors'
import type { GitAdapter } from './interface'
import {
  BRANCH_REF_FORMAT,
  LOG_FORMAT,
  TAG_REF_FORMAT,
  parseBranchRefs,
  parseHead,
  parseLogOutput,
  parseShaList,
  parseTagRefs
} from './parsers'
import type { BranchRefOptions, HistoryOptions, SnapshotOptions } from './types'

export class SimpleGitAdapter implements GitAdapter {
  readonly name = 'simple-git'

  private createGit(dir: string): SimpleGit {
    return simpleGit(dir)
  }

  // ============================================================================
  // Repository Inspection
  // ============================================================================

  async readHistory(dir: string, options?: HistoryOptions): Promise<RawCommit[]> {
    try {
      const git = this.createGit(dir)
      const args = ['log', '--exclude=refs/stash', '--all', '--topo-order', '--date-order']

      if (options?.maxCount !== undefined) {
        args.push(`--max-count=${options.maxCount}`)
      }
      args.push(`--format=${LOG_FORMAT}`)

      const output = await git.raw(args)
      return parseLogOutput(output)
    } catch (error) {
      throw this.createError('readHistory', error)
    }
  }

  async listBranchRefs(dir: string, options?: BranchRefOptions): Promise<RawBranchRef[]> {
    try {
      const git = this.createGit(dir)
      const namespaces = options?.includeRemote ? ['refs/heads', 'refs/remotes'] : ['refs/heads']
      const output = await git.raw(['for-each-ref', `--format=${BRANCH_REF_FORMAT}`, ...namespaces])
      return parseBranchRefs(output)
    } catch (error) {
      throw this.createError('listBranchRefs', error)
    }
  }

  async listTagRefs(dir: string): Promise<RawTagRef[]> {
    try {
      const git = this.createGit(dir)
      const output = await git.raw(['for-each-ref', `--format=${TAG_REF_FORMAT}`, 'refs/tags'])
      return parseTagRefs(output)
    } catch (error) {
      throw this.createError('listTagRefs', error)
    }
  }

  async readHead(dir: string): Promise<RawHead> {
    try {
      const git = this.createGit(dir)
      const symbolicName = await git.raw(['rev-parse', '--symbolic-full-name', 'HEAD'])
      const sha = await git.raw(['rev-parse', 'HEAD'])
      return parseHead(symbolicName, sha)
    } catch (error) {
      throw this.createError('readHead', error)
    }
  }

  async listStashShas(dir: string): Promise<string[]> {
    try {
      const git = this.createGit(dir)
      const output = await git.raw(['stash', 'list', '--format=%H'])
      return parseShaList(output)
    } catch (error) {
      throw this.createError('listStashShas', error)
    }
  }

  async readSnapshot(dir: string, options: SnapshotOptions = {}): Promise<RepositorySnapshot> {
    const head = await this.readHead(dir)
    const excludedShas = await this.listStashShas(dir)
    const branches = await this.listBranchRefs(dir, { includeRemote: options.includeRemote })
    const tags = await this.listTagRefs(dir)
    const commits = await this.readHistory(dir, { maxCount: options.maxCount })

    log.debug(
      `[SimpleGitAdapter] Snapshot of ${dir}: ${commits.length} commits, ${branches.length} branches, ${tags.length} tags`
    )

    return { commits, branches, tags, head, excludedShas }
  }

  // ============================================================================
  // Error Handling
  // ============================================================================

  private createError(operation: string, error: unknown): GitError {
    if (error instanceof GitError) return error
    const message = error instanceof Error ? error.message : String(error)
    return new GitError(`[SimpleGitAdapter] ${operation} failed: ${message}`, operation, error)
  }
}
