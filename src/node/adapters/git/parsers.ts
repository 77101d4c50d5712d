/**
 * Parsers for the git output formats requested by SimpleGitAdapter.
 * Kept free of I/O so they can be tested against captured output.
 */

import type { RawBranchRef, RawCommit, RawHead, RawTagRef } from '@shared/types'
import { GitError } from '../../shared/errors'

export const FIELD_SEPARATOR = '\x1f'
export const RECORD_SEPARATOR = '\x1e'

export const LOG_FORMAT =
  ['%H', '%P', '%an', '%ae', '%at', '%cn', '%ce', '%ct', '%s'].join('%x1f') + '%x1e'
export const BRANCH_REF_FORMAT = '%(refname)%09%(objectname)%09%(symref)'
export const TAG_REF_FORMAT = '%(refname)%09%(objectname)%09%(*objectname)'

const LOG_FIELD_COUNT = 9

function toTimeMs(seconds: string): number {
  const value = Number.parseInt(seconds, 10)
  return Number.isNaN(value) ? 0 : value * 1000
}

/**
 * Parses `git log --format=LOG_FORMAT` output.
 */
export function parseLogOutput(output: string): RawCommit[] {
  const commits: RawCommit[] = []

  for (const record of output.split(RECORD_SEPARATOR)) {
    const trimmed = record.replace(/^\n+/, '')
    if (!trimmed) continue

    const fields = trimmed.split(FIELD_SEPARATOR)
    if (fields.length !== LOG_FIELD_COUNT) {
      throw new GitError(
        `Unexpected log record with ${fields.length} fields: ${trimmed.slice(0, 80)}`,
        'readHistory'
      )
    }

    const [
      sha,
      parents,
      authorName,
      authorEmail,
      authorTime,
      committerName,
      committerEmail,
      committerTime,
      summary
    ] = fields

    commits.push({
      sha,
      parentShas: parents ? parents.split(' ').filter(Boolean) : [],
      summary,
      author: { name: authorName, email: authorEmail, timeMs: toTimeMs(authorTime) },
      committer: { name: committerName, email: committerEmail, timeMs: toTimeMs(committerTime) }
    })
  }

  return commits
}

function splitLines(output: string): string[][] {
  return output
    .split('\n')
    .filter((line) => line.trim() !== '')
    .map((line) => line.split('\t'))
}

/**
 * Parses `git for-each-ref --format=BRANCH_REF_FORMAT refs/heads refs/remotes`.
 * Symbolic refs such as refs/remotes/origin/HEAD are skipped.
 */
export function parseBranchRefs(output: string): RawBranchRef[] {
  const refs: RawBranchRef[] = []
  for (const [fullRef, targetSha, symref] of splitLines(output)) {
    if (!fullRef || !targetSha || symref) continue
    refs.push({ fullRef, targetSha, isRemote: fullRef.startsWith('refs/remotes/') })
  }
  return refs
}

/**
 * Parses `git for-each-ref --format=TAG_REF_FORMAT refs/tags`.
 * Annotated tags carry the peeled object id in the third column.
 */
export function parseTagRefs(output: string): RawTagRef[] {
  const refs: RawTagRef[] = []
  for (const [fullRef, objectSha, peeledSha] of splitLines(output)) {
    if (!fullRef || !objectSha) continue
    refs.push({ fullRef, targetSha: peeledSha || objectSha })
  }
  return refs
}

/**
 * Combines `rev-parse --symbolic-full-name HEAD` and `rev-parse HEAD`.
 */
export function parseHead(symbolicName: string, sha: string): RawHead {
  const fullRef = symbolicName.trim() || 'HEAD'
  return {
    fullRef,
    sha: sha.trim(),
    isBranch: fullRef.startsWith('refs/heads/')
  }
}

/**
 * Parses `git stash list --format=%H`.
 */
export function parseShaList(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)
}
