/**
 * BranchCatalogBuilder - Collects every branch line candidate before tracing.
 *
 * Candidates come from three sources:
 * - branch refs (local, and remote when enabled), tip = ref target
 * - merge commits, tip = second parent, name parsed from the summary
 * - tags, traced last
 *
 * The returned order is the trace order: lower persistence rank first, real
 * branches before merge-derived ones at equal rank, tags at the end.
 */

import { log } from '@shared/logger'
import type {
  BranchRecord,
  GraphSettings,
  RawBranchRef,
  RawTagRef,
  SkippedReference
} from '@shared/types'
import { EncodingError, MalformedReferenceError } from '../shared/errors'
import { BranchPatterns, DEFAULT_REMOTE } from './BranchPatterns'
import type { CommitIndex } from './CommitIndex'

export const LOCAL_BRANCH_PREFIX = 'refs/heads/'
export const REMOTE_BRANCH_PREFIX = 'refs/remotes/'
export const TAG_PREFIX = 'refs/tags/'
export const UNKNOWN_BRANCH = 'unknown'

export type CatalogInput = {
  index: CommitIndex
  branches: RawBranchRef[]
  tags: RawTagRef[]
  settings: GraphSettings
}

export type CatalogResult = {
  candidates: BranchRecord[]
  skipped: SkippedReference[]
  /** Remote names recognised as remote-tracking prefixes. */
  remotes: ReadonlySet<string>
}

type CandidateSeed = {
  targetSha: string
  mergeTargetSha: string | null
  name: string
  persistence: number
  isRemote: boolean
  isMerged: boolean
  isTag: boolean
  start: number | null
}

export class BranchCatalogBuilder {
  private counter = 0
  private readonly skipped: SkippedReference[] = []

  private constructor(
    private readonly settings: GraphSettings,
    private readonly remotes: ReadonlySet<string>
  ) {}

  public static build(input: CatalogInput): CatalogResult {
    const { index, settings } = input
    const refs = settings.includeRemote
      ? input.branches
      : input.branches.filter((branch) => !branch.isRemote)
    // Local branches are catalogued before remote ones
    const ordered = [...refs.filter((ref) => !ref.isRemote), ...refs.filter((ref) => ref.isRemote)]

    const remotes = BranchCatalogBuilder.collectRemotes(ordered)
    const builder = new BranchCatalogBuilder(settings, remotes)

    const candidates: BranchRecord[] = []
    for (const ref of ordered) {
      const candidate = builder.fromBranchRef(ref, index)
      if (candidate) candidates.push(candidate)
    }
    candidates.push(...builder.fromMergeCommits(index))

    const rankOf = (branch: BranchRecord): number => (branch.isMerged ? 1 : 0)
    candidates.sort((a, b) => a.persistence - b.persistence || rankOf(a) - rankOf(b))

    for (const tag of input.tags) {
      const candidate = builder.fromTagRef(tag, index)
      if (candidate) candidates.push(candidate)
    }

    log.debug(
      `[BranchCatalogBuilder] ${candidates.length} candidates, ${builder.skipped.length} skipped refs`
    )

    return { candidates, skipped: builder.skipped, remotes }
  }

  /**
   * Remote names seen among remote-tracking refs, plus the default remote.
   */
  private static collectRemotes(refs: RawBranchRef[]): Set<string> {
    const remotes = new Set<string>([DEFAULT_REMOTE])
    for (const ref of refs) {
      if (!ref.isRemote || !ref.fullRef.startsWith(REMOTE_BRANCH_PREFIX)) continue
      const name = ref.fullRef.slice(REMOTE_BRANCH_PREFIX.length)
      const slash = name.indexOf('/')
      if (slash > 0) remotes.add(name.slice(0, slash))
    }
    return remotes
  }

  /**
   * Strips the namespace prefix from a ref, validating the name on the way.
   */
  public static refName(fullRef: string, prefix: string): string {
    if (fullRef.includes('\uFFFD') || fullRef.includes('\0')) {
      throw new EncodingError(`Reference name is not valid text: ${fullRef}`, fullRef)
    }
    if (!fullRef.startsWith(prefix)) {
      throw new MalformedReferenceError(`Reference ${fullRef} does not start with ${prefix}`, fullRef)
    }
    if (fullRef.length === prefix.length) {
      throw new MalformedReferenceError(`Reference ${fullRef} has an empty name`, fullRef)
    }
    return fullRef.slice(prefix.length)
  }

  private resolveName(fullRef: string, prefix: string): string | null {
    try {
      return BranchCatalogBuilder.refName(fullRef, prefix)
    } catch (error) {
      if (error instanceof EncodingError || error instanceof MalformedReferenceError) {
        log.warn(`[BranchCatalogBuilder] Skipping reference: ${error.message}`)
        this.skipped.push({
          ref: fullRef,
          reason: error instanceof EncodingError ? 'encoding' : 'malformed',
          message: error.message
        })
        return null
      }
      throw error
    }
  }

  private fromBranchRef(ref: RawBranchRef, index: CommitIndex): BranchRecord | null {
    const name = this.resolveName(
      ref.fullRef,
      ref.isRemote ? REMOTE_BRANCH_PREFIX : LOCAL_BRANCH_PREFIX
    )
    if (name === null) return null

    return this.createRecord({
      targetSha: ref.targetSha,
      mergeTargetSha: null,
      name,
      persistence: BranchPatterns.rank(name, this.settings.branches.persistence, this.remotes),
      isRemote: ref.isRemote,
      isMerged: false,
      isTag: false,
      start: index.indexOf(ref.targetSha) ?? null
    })
  }

  private fromMergeCommits(index: CommitIndex): BranchRecord[] {
    const records: BranchRecord[] = []

    index.commits.forEach((commit, position) => {
      if (!commit.isMerge) return

      const name =
        BranchPatterns.parseMergeSummary(commit.summary, this.settings.mergePatterns) ??
        UNKNOWN_BRANCH

      records.push(
        this.createRecord({
          targetSha: commit.parentShas[1],
          mergeTargetSha: commit.sha,
          name,
          persistence: BranchPatterns.rank(name, this.settings.branches.persistence, this.remotes),
          isRemote: false,
          isMerged: true,
          isTag: false,
          start: position + 1
        })
      )
    })

    return records
  }

  private fromTagRef(ref: RawTagRef, index: CommitIndex): BranchRecord | null {
    const shortName = this.resolveName(ref.fullRef, TAG_PREFIX)
    if (shortName === null) return null
    // Tags keep their namespace, e.g. tags/v1.0, so patterns can single them out
    const name = `tags/${shortName}`

    const position = index.indexOf(ref.targetSha)
    if (position === undefined) return null

    return this.createRecord({
      targetSha: ref.targetSha,
      mergeTargetSha: null,
      name,
      persistence: this.settings.branches.persistence.length + 1,
      isRemote: false,
      isMerged: false,
      isTag: true,
      start: position
    })
  }

  private createRecord(seed: CandidateSeed): BranchRecord {
    this.counter += 1
    const { branches } = this.settings

    return {
      targetSha: seed.targetSha,
      mergeTargetSha: seed.mergeTargetSha,
      name: seed.name,
      persistence: seed.persistence,
      isRemote: seed.isRemote,
      isMerged: seed.isMerged,
      isTag: seed.isTag,
      visual: {
        orderGroup: BranchPatterns.rank(seed.name, branches.order, this.remotes),
        sourceOrderGroup: null,
        targetOrderGroup: null,
        termColor: BranchPatterns.color(
          seed.name,
          branches.terminalColors,
          branches.terminalColorsUnknown,
          this.counter,
          this.remotes
        ),
        svgColor: BranchPatterns.color(
          seed.name,
          branches.svgColors,
          branches.svgColorsUnknown,
          this.counter,
          this.remotes
        ),
        column: null
      },
      range: { start: seed.start, end: null }
    }
  }
}
