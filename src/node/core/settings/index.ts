export { compileSettings, loadSettings, readSettingsFile } from './load-settings'
export type { SettingsSource } from './load-settings'
export { DEFAULT_MERGE_PATTERNS, DEFAULT_PRESET, PRESETS, PRESET_NAMES, isPresetName } from './presets'
export type { PresetName } from './presets'
export { GraphSettingsSchema } from './schema'
export type { RawGraphSettings } from './schema'
export { TERMINAL_COLOR_NAMES, toTerminalColor } from './terminal-colors'
