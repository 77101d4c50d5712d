import fs from 'fs'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { SettingsError } from '../../../shared/errors'
import { compileSettings, loadSettings, PRESET_NAMES, PRESETS } from '..'
import type { RawGraphSettings } from '..'

function minimalSettings(overrides: Partial<RawGraphSettings['branches']> = {}): RawGraphSettings {
  return {
    branches: {
      persistence: ['^main$'],
      order: [],
      terminalColors: [],
      terminalColorsUnknown: ['white'],
      svgColors: [],
      svgColorsUnknown: ['gray'],
      ...overrides
    },
    mergePatterns: []
  }
}

describe('compileSettings', () => {
  it.each(PRESET_NAMES)('compiles the %s preset', (name) => {
    expect(() => compileSettings(PRESETS[name], name)).not.toThrow()
  })

  it('turns patterns into regular expressions and color names into palette indices', () => {
    const settings = compileSettings(PRESETS['git-flow'], 'git-flow')

    expect(settings.branches.persistence[0]).toEqual(/^(master|main|trunk)$/)
    expect(settings.branches.terminalColors[2].colors).toEqual([13, 14])
    expect(settings.branches.terminalColorsUnknown).toEqual([7])
    expect(settings.branches.svgColors[1]).toEqual({ pattern: /^(develop|dev)$/, colors: ['orange'] })
  })

  it('applies defaults for omitted fields', () => {
    const settings = compileSettings(minimalSettings(), 'test')

    expect(settings.includeRemote).toBe(true)
    expect(settings.branchOrder).toEqual({ kind: 'shortest-first', forward: true })
  })

  it('accepts palette indices as numbers or numeric strings', () => {
    const settings = compileSettings(
      minimalSettings({ terminalColorsUnknown: [3, '208', 'bright_black'] }),
      'test'
    )

    expect(settings.branches.terminalColorsUnknown).toEqual([3, 208, 8])
  })

  it('rejects an invalid regular expression', () => {
    expect(() => compileSettings(minimalSettings({ persistence: ['('] }), 'test')).toThrow(
      /branches\.persistence\.0: Invalid regular expression "\("/
    )
  })

  it('rejects unknown terminal colors', () => {
    expect(() =>
      compileSettings(minimalSettings({ terminalColorsUnknown: ['chartreuse'] }), 'test')
    ).toThrow('Invalid settings in test: branches.terminalColorsUnknown.0: Unknown terminal color "chartreuse"')
  })

  it('rejects empty color lists', () => {
    expect(() => compileSettings(minimalSettings({ svgColorsUnknown: [] }), 'test')).toThrow(
      SettingsError
    )
    expect(() =>
      compileSettings(minimalSettings({ svgColors: [['^main$', []]] }), 'test')
    ).toThrow(SettingsError)
  })

  it('rejects an unknown branch order', () => {
    expect(() =>
      compileSettings({ ...minimalSettings(), branchOrder: { kind: 'random', forward: true } }, 'test')
    ).toThrow(SettingsError)
  })
})

describe('loadSettings', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lanegraph-settings-'))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('uses the git-flow preset by default', () => {
    const settings = loadSettings()

    expect(settings.branches.persistence).toHaveLength(6)
    expect(settings.branches.order).toHaveLength(3)
  })

  it('loads a named preset', () => {
    expect(loadSettings({ model: 'simple' }).branches.persistence).toHaveLength(1)
    expect(loadSettings({ model: 'none' }).branches.persistence).toHaveLength(0)
  })

  it('rejects an unknown preset', () => {
    expect(() => loadSettings({ model: 'fancy' })).toThrow(
      'Unknown model "fancy", expected one of: git-flow, simple, none'
    )
  })

  it('overrides includeRemote', () => {
    expect(loadSettings({ includeRemote: false }).includeRemote).toBe(false)
  })

  it('reads a JSON settings file in place of a preset', () => {
    const file = path.join(tempDir, 'settings.json')
    fs.writeFileSync(
      file,
      JSON.stringify({ ...minimalSettings(), branchOrder: { kind: 'longest-first', forward: false } })
    )

    const settings = loadSettings({ model: 'simple', settingsFile: file })

    expect(settings.branches.persistence).toEqual([/^main$/])
    expect(settings.branchOrder).toEqual({ kind: 'longest-first', forward: false })
  })

  it('reports unreadable and invalid settings files', () => {
    const broken = path.join(tempDir, 'broken.json')
    fs.writeFileSync(broken, '{ not json')

    expect(() => loadSettings({ settingsFile: broken })).toThrow(
      `Settings file ${broken} is not valid JSON`
    )
    expect(() => loadSettings({ settingsFile: path.join(tempDir, 'missing.json') })).toThrow(
      SettingsError
    )
  })
})
