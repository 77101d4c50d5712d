import { log, setLogLevel } from '@shared/logger'
import { buildGitGraph, getGitAdapter, loadConfiguration, loadSettings, printGraph } from './node'

export async function main(): Promise<void> {
  try {
    const config = loadConfiguration()
    if (config.logLevel) setLogLevel(config.logLevel)
    log.info(`Building commit graph for: ${config.repoPath}`)

    const settings = loadSettings({
      model: config.model,
      settingsFile: config.settingsFile,
      includeRemote: config.includeRemote
    })
    const adapter = getGitAdapter({ verbose: config.logLevel === 'debug' })
    const graph = await buildGitGraph(config, settings, adapter)

    log.info(
      `${graph.commits.length} commits, ${graph.branches.length} branches, ${graph.tags.length} tags`
    )
    printGraph(graph)
  } catch (error) {
    log.error('Error building commit graph:', error)
    process.exitCode = 1
  }
}

void main()
