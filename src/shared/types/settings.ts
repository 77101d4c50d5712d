/**
 * Compiled layout settings, as consumed by the graph builder.
 * Raw (JSON) settings are validated and compiled by the settings module.
 */

export type BranchOrder = {
  /** Allocate columns to short ranges first, or long ranges first. */
  kind: 'shortest-first' | 'longest-first'
  /** Process earlier range starts first when true. */
  forward: boolean
}

export type ColorRule<T> = {
  pattern: RegExp
  colors: T[]
}

export type BranchSettings = {
  /** First match claims shared history first. */
  persistence: RegExp[]
  /** Position groups, left to right. */
  order: RegExp[]
  terminalColors: ColorRule<number>[]
  terminalColorsUnknown: number[]
  svgColors: ColorRule<string>[]
  svgColorsUnknown: string[]
}

export type GraphSettings = {
  includeRemote: boolean
  branchOrder: BranchOrder
  branches: BranchSettings
  /** Each pattern must have exactly one capture group: the merged branch name. */
  mergePatterns: RegExp[]
}
