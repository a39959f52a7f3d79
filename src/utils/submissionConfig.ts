import fs from 'fs'
import path from 'path'
import * as TOML from '@iarna/toml'
import { z } from 'zod'
import { SUBMISSION_CONFIG_FILE, TOOL_VERSION } from '../constants'
import { IdentityKey } from '../models/Metadata'
import { PsfError, errorMessage } from './errors'
import { satisfiesMinimum } from './versionUtils'

/** Settings a course ships inside the directory students submit */
export interface SubmissionConfig {
  path: string
  metadata: Partial<IdentityKey>
  exclude: string[]
  validAssignments: string[]
  minimumVersion?: string
}

const SubmissionConfigSchema = z.object({
  course: z.string().optional(),
  section: z.string().optional(),
  semester: z.string().optional(),
  assignment: z.string().optional(),
  group: z.string().optional(),
  exclude: z.array(z.string()).default([]),
  valid_assignment_names: z.array(z.string()).default([]),
  minimum_version: z.string().optional(),
})

export function parseSubmissionConfig(text: string, source: string): SubmissionConfig {
  let raw: TOML.JsonMap
  try {
    raw = TOML.parse(text)
  } catch (e) {
    throw new PsfError('MALFORMED_INPUT', `'${source}' is not valid TOML: ${errorMessage(e)}`, { cause: e })
  }

  const parsed = SubmissionConfigSchema.safeParse(raw)
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new PsfError('MALFORMED_INPUT', `'${source}' is invalid: ${detail}`)
  }

  const { course, section, semester, assignment, group } = parsed.data
  const metadata: Partial<IdentityKey> = {
    ...(course !== undefined ? { course } : {}),
    ...(section !== undefined ? { section } : {}),
    ...(semester !== undefined ? { semester } : {}),
    ...(assignment !== undefined ? { assignment } : {}),
    ...(group !== undefined ? { group } : {}),
  }

  return {
    path: source,
    metadata,
    exclude: parsed.data.exclude,
    validAssignments: parsed.data.valid_assignment_names,
    minimumVersion: parsed.data.minimum_version,
  }
}

/** Returns null when the source directory carries no config file */
export function loadSubmissionConfig(sourceDir: string): SubmissionConfig | null {
  const configPath = path.join(sourceDir, SUBMISSION_CONFIG_FILE)
  if (!fs.existsSync(configPath)) return null
  return parseSubmissionConfig(fs.readFileSync(configPath, 'utf8'), configPath)
}

export function assertToolVersion(config: SubmissionConfig, installed = TOOL_VERSION) {
  if (config.minimumVersion === undefined) return
  if (!satisfiesMinimum(installed, config.minimumVersion)) {
    throw new PsfError(
      'VERSION_INCOMPATIBLE',
      `installed version ${installed} does not meet minimum ${config.minimumVersion} required by '${config.path}'`
    )
  }
}
