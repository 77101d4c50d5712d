/**
 * Public surface of the graph engine.
 */

export { getGitAdapter, resetGitAdapter, setGitAdapter, SimpleGitAdapter } from './adapters/git'
export type { GitAdapter, SnapshotOptions } from './adapters/git'
export { loadConfiguration } from './core/config'
export type { Configuration } from './core/config'
export { compileSettings, loadSettings, PRESET_NAMES } from './core/settings'
export type { PresetName, RawGraphSettings, SettingsSource } from './core/settings'
export { buildGitGraph } from './core/utils/build-graph'
export { formatRange, printGraph } from './core/utils/print-graph'
export { GraphBuilder } from './domain'
export type { GraphBuildOptions } from './domain'
export * from './shared/errors'
