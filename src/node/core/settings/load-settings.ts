import { log } from '@shared/logger'
import type { GraphSettings } from '@shared/types'
import fs from 'fs'
import { SettingsError } from '../../shared/errors'
import { DEFAULT_PRESET, PRESETS, PRESET_NAMES, isPresetName } from './presets'
import { GraphSettingsSchema } from './schema'

export type SettingsSource = {
  /** Preset name; ignored when a settings file is given. */
  model?: string
  /** Path to a JSON settings file. */
  settingsFile?: string
  /** Overrides the includeRemote flag of the loaded settings. */
  includeRemote?: boolean
}

/**
 * Validates raw settings and compiles patterns and colors.
 *
 * @param source - where the settings came from, for error messages
 */
export function compileSettings(raw: unknown, source: string): GraphSettings {
  const result = GraphSettingsSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new SettingsError(`Invalid settings in ${source}: ${issues}`, source, result.error)
  }
  return result.data
}

export function readSettingsFile(path: string): unknown {
  let content: string
  try {
    content = fs.readFileSync(path, 'utf8')
  } catch (error) {
    throw new SettingsError(`Cannot read settings file ${path}`, path, error)
  }

  try {
    return JSON.parse(content)
  } catch (error) {
    throw new SettingsError(`Settings file ${path} is not valid JSON`, path, error)
  }
}

export function loadSettings(options: SettingsSource = {}): GraphSettings {
  let settings: GraphSettings

  if (options.settingsFile) {
    settings = compileSettings(readSettingsFile(options.settingsFile), options.settingsFile)
  } else {
    const model = options.model ?? DEFAULT_PRESET
    if (!isPresetName(model)) {
      throw new SettingsError(
        `Unknown model "${model}", expected one of: ${PRESET_NAMES.join(', ')}`,
        model
      )
    }
    settings = compileSettings(PRESETS[model], `preset ${model}`)
  }

  if (options.includeRemote !== undefined) {
    settings = { ...settings, includeRemote: options.includeRemote }
  }

  log.debug(
    `[Settings] ${settings.branches.persistence.length} persistence patterns, ${settings.branches.order.length} position groups, ${settings.mergePatterns.length} merge patterns`
  )
  return settings
}
