import type { RawGraphSettings } from './schema'

export const PRESET_NAMES = ['git-flow', 'simple', 'none'] as const
export type PresetName = (typeof PRESET_NAMES)[number]

export const DEFAULT_PRESET: PresetName = 'git-flow'

/**
 * Merge summary formats of the common hosting tools and of plain `git merge`.
 */
export const DEFAULT_MERGE_PATTERNS = [
  // GitLab pull request
  "^Merge branch '(.+)' into '.+'$",
  // Git default
  "^Merge branch '(.+)' into .+$",
  // Git default into main branch
  "^Merge branch '(.+)'$",
  // GitHub pull request
  '^Merge pull request #[0-9]+ from .[^/]+/(.+)$',
  // Pull from another repository
  "^Merge branch '(.+)' of .+$",
  // BitBucket pull request
  '^Merged in (.+) \\(pull request #[0-9]+\\)$'
]

const gitFlow: RawGraphSettings = {
  branches: {
    persistence: [
      '^(master|main|trunk)$',
      '^(develop|dev)$',
      '^feature.*$',
      '^release.*$',
      '^hotfix.*$',
      '^bugfix.*$'
    ],
    order: ['^(master|main|trunk)$', '^(hotfix|release).*$', '^(develop|dev)$'],
    terminalColors: [
      ['^(master|main|trunk)$', ['bright_blue']],
      ['^(develop|dev)$', ['bright_yellow']],
      ['^(feature|fork/).*$', ['bright_magenta', 'bright_cyan']],
      ['^release.*$', ['bright_green']],
      ['^(bugfix|hotfix).*$', ['bright_red']],
      ['^tags/.*$', ['bright_green']]
    ],
    terminalColorsUnknown: ['white'],
    svgColors: [
      ['^(master|main|trunk)$', ['blue']],
      ['^(develop|dev)$', ['orange']],
      ['^(feature|fork/).*$', ['purple', 'turquoise']],
      ['^release.*$', ['mediumseagreen']],
      ['^(bugfix|hotfix).*$', ['red']],
      ['^tags/.*$', ['green']]
    ],
    svgColorsUnknown: ['gray']
  },
  mergePatterns: DEFAULT_MERGE_PATTERNS
}

const simple: RawGraphSettings = {
  branches: {
    persistence: ['^(master|main|trunk)$'],
    order: ['^tags/.*$', '^(master|main|trunk)$'],
    terminalColors: [
      ['^(master|main|trunk)$', ['bright_blue']],
      ['^tags/.*$', ['bright_green']]
    ],
    terminalColorsUnknown: [
      'bright_yellow',
      'bright_green',
      'bright_red',
      'bright_magenta',
      'bright_cyan'
    ],
    svgColors: [
      ['^(master|main|trunk)$', ['blue']],
      ['^tags/.*$', ['green']]
    ],
    svgColorsUnknown: ['orange', 'green', 'red', 'purple', 'turquoise']
  },
  mergePatterns: DEFAULT_MERGE_PATTERNS
}

const none: RawGraphSettings = {
  branches: {
    persistence: [],
    order: [],
    terminalColors: [],
    terminalColorsUnknown: ['white'],
    svgColors: [],
    svgColorsUnknown: ['black']
  },
  mergePatterns: DEFAULT_MERGE_PATTERNS
}

export const PRESETS: Readonly<Record<PresetName, RawGraphSettings>> = {
  'git-flow': gitFlow,
  simple,
  none
}

export function isPresetName(value: string): value is PresetName {
  return PRESET_NAMES.some((name) => name === value)
}
