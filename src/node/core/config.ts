import type { LogLevel } from '@shared/logger'
import dotenv from 'dotenv'
import { z } from 'zod'
import { ConfigurationError } from '../shared/errors'

dotenv.config()

export type Configuration = {
  repoPath: string
  /** Preset used when no settings file is given. */
  model: string
  settingsFile?: string
  maxCount?: number
  includeRemote?: boolean
  logLevel?: LogLevel
}

const BooleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes')

const EnvironmentSchema = z.object({
  REPO_PATH: z.string().min(1).optional(),
  GRAPH_MODEL: z.string().min(1).default('git-flow'),
  GRAPH_SETTINGS_FILE: z.string().min(1).optional(),
  GRAPH_MAX_COUNT: z.coerce.number().int().positive().optional(),
  GRAPH_INCLUDE_REMOTE: BooleanFlag.optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional()
})

export function loadConfiguration(env: NodeJS.ProcessEnv = process.env): Configuration {
  const result = EnvironmentSchema.safeParse(env)
  if (!result.success) {
    const issue = result.error.issues[0]
    const field = issue?.path.join('.')
    throw new ConfigurationError(
      `Invalid configuration${field ? ` for ${field}` : ''}: ${issue?.message ?? 'unknown error'}`,
      field
    )
  }

  const parsed = result.data
  return {
    repoPath: parsed.REPO_PATH ?? process.cwd(),
    model: parsed.GRAPH_MODEL,
    settingsFile: parsed.GRAPH_SETTINGS_FILE,
    maxCount: parsed.GRAPH_MAX_COUNT,
    includeRemote: parsed.GRAPH_INCLUDE_REMOTE,
    logLevel: parsed.LOG_LEVEL
  }
}
