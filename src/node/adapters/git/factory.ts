/**
 * Git Adapter Factory
 *
 * Provides a centralized way to create and access Git adapter instances.
 */

import { log } from '@shared/logger'
import type { GitAdapter } from './interface'
import { SimpleGitAdapter } from './SimpleGitAdapter'

/**
 * Supported Git adapter types
 */
export type GitAdapterType = 'simple-git'

/**
 * Configuration for adapter creation
 */
export interface GitAdapterConfig {
  /**
   * Whether to log adapter creation
   */
  verbose?: boolean
}

/**
 * Singleton adapter instance
 * Cached to avoid recreating adapters on every operation
 */
let cachedAdapter: GitAdapter | null = null

/**
 * Create a Git adapter instance
 */
export function createGitAdapter(config: GitAdapterConfig = {}): GitAdapter {
  if (config.verbose) {
    log.info(`[GitAdapter] Creating adapter: simple-git`)
  }

  return new SimpleGitAdapter()
}

/**
 * Get the singleton Git adapter instance
 *
 * The instance is cached and reused across calls.
 *
 * @param config - Optional configuration (only used on first call)
 */
export function getGitAdapter(config: GitAdapterConfig = {}): GitAdapter {
  if (cachedAdapter) {
    return cachedAdapter
  }

  cachedAdapter = createGitAdapter(config)
  return cachedAdapter
}

/**
 * Replace the cached adapter, e.g. with an in-memory fake in tests
 */
export function setGitAdapter(adapter: GitAdapter): void {
  cachedAdapter = adapter
}

/**
 * Reset the cached adapter instance
 */
export function resetGitAdapter(): void {
  cachedAdapter = null
}
