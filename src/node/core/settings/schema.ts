/**
 * Validation and compilation of layout settings.
 *
 * Raw settings (presets or JSON files) name their patterns as strings and
 * their terminal colors by name; parsing turns them into the compiled
 * GraphSettings the graph builder consumes.
 */

import { z } from 'zod'
import { toTerminalColor } from './terminal-colors'

const PatternSchema = z.string().transform((source, ctx) => {
  try {
    return new RegExp(source)
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid regular expression ${JSON.stringify(source)}: ${
        error instanceof Error ? error.message : String(error)
      }`
    })
    return z.NEVER
  }
})

const TerminalColorSchema = z.union([
  z.number().int().min(0).max(255),
  z.string().transform((value, ctx) => {
    const color = toTerminalColor(value)
    if (color === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown terminal color ${JSON.stringify(value)}`
      })
      return z.NEVER
    }
    return color
  })
])

const SvgColorSchema = z.string().min(1)

function colorRules<T extends z.ZodTypeAny>(colorSchema: T) {
  return z
    .array(z.tuple([PatternSchema, z.array(colorSchema).min(1)]))
    .transform((rules) => rules.map(([pattern, colors]) => ({ pattern, colors })))
}

export const BranchOrderSchema = z.object({
  kind: z.enum(['shortest-first', 'longest-first']),
  forward: z.boolean()
})

export const GraphSettingsSchema = z.object({
  includeRemote: z.boolean().default(true),
  branchOrder: BranchOrderSchema.default({ kind: 'shortest-first', forward: true }),
  branches: z.object({
    persistence: z.array(PatternSchema),
    order: z.array(PatternSchema),
    terminalColors: colorRules(TerminalColorSchema),
    terminalColorsUnknown: z.array(TerminalColorSchema).min(1),
    svgColors: colorRules(SvgColorSchema),
    svgColorsUnknown: z.array(SvgColorSchema).min(1)
  }),
  mergePatterns: z.array(PatternSchema)
})

/**
 * Settings as written in a preset or a JSON settings file.
 */
export type RawGraphSettings = z.input<typeof GraphSettingsSchema>

