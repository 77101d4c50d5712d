import { log } from '@shared/logger'
import type { GitGraph, GraphSettings, RepositorySnapshot } from '@shared/types'
import { getGitAdapter } from '../../adapters/git'
import type { GitAdapter } from '../../adapters/git'
import { GraphBuilder } from '../../domain'
import { GitError, StructuralAccessError } from '../../shared/errors'
import type { Configuration } from '../config'

/**
 * Reads the repository at `config.repoPath` and lays out its commit graph.
 *
 * Git failures surface as StructuralAccessError: from the caller's point of
 * view the repository could not be read.
 */
export async function buildGitGraph(
  config: Configuration,
  settings: GraphSettings,
  adapter: GitAdapter = getGitAdapter()
): Promise<GitGraph> {
  log.debug(`[buildGitGraph] Reading ${config.repoPath} with ${adapter.name}`)

  let snapshot: RepositorySnapshot
  try {
    snapshot = await adapter.readSnapshot(config.repoPath, {
      maxCount: config.maxCount,
      includeRemote: settings.includeRemote
    })
  } catch (error) {
    if (error instanceof GitError) {
      throw new StructuralAccessError(
        `Cannot read repository at ${config.repoPath}: ${error.message}`,
        undefined,
        error
      )
    }
    throw error
  }

  return GraphBuilder.build(snapshot, settings, { maxCount: config.maxCount })
}
