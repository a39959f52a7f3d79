import { z } from 'zod'
import { LOG_LEVELS, LogLevel } from './utils/logger'
import { PsfError } from './utils/errors'

export interface AppConfig {
  /** Colon-separated list of course definition files or directories */
  coursePath: string
  logLevel: LogLevel
}

const blankAsUnset = (value: unknown) => (value === '' ? undefined : value)

const EnvSchema = z.object({
  PSF_COURSEPATH: z.preprocess(blankAsUnset, z.string().default('./')),
  PSF_LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? blankAsUnset(value.toLowerCase()) : value),
    z.enum(['debug', 'info', 'warn', 'error']).default('info')
  ),
})

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new PsfError('MALFORMED_INPUT', `invalid environment configuration (${detail}), expected PSF_LOG_LEVEL in ${LOG_LEVELS.join('|')}`)
  }
  return {
    coursePath: parsed.data.PSF_COURSEPATH,
    logLevel: parsed.data.PSF_LOG_LEVEL,
  }
}
