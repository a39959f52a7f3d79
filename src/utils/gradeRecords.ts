/**
 * Grade record input
 *
 * CSV (or TSV) with a header naming identity fields and an override column:
 *
 *   semester,assignment,section,course,group,override
 *   C,D,B,A,E,0.1
 *
 * Only the identity fields present in the header take part in matching.
 * An optional feedback column carries instructor comments. Any other column
 * is refused, since a misspelt key column would silently widen the match.
 */

import fs from 'fs'
import { parse } from 'csv-parse/sync'
import { z } from 'zod'
import { IDENTITY_FIELDS } from '../constants'
import { IdentityField, IdentityKey, isIdentityField } from '../models/Metadata'
import { PsfError, errorMessage, isMissingFileError } from './errors'
import { createLogger } from './logger'

const log = createLogger('Import')

export const OVERRIDE_FIELD = 'override'
export const FEEDBACK_FIELD = 'feedback'

export interface GradeRow {
  /** 1-based record number in the input, header included */
  line: number
  key: Partial<IdentityKey>
  override: number
  feedback?: string
}

export interface GradeBatch {
  keyFields: IdentityField[]
  rows: GradeRow[]
}

export interface GradeRecordOptions {
  delimiter?: ',' | '\t'
  /** Explicit column list; when given the first record is data, not a header */
  schema?: string[]
}

const RecordsSchema = z.array(z.array(z.string()))

export function parseGradeRecords(text: string, options: GradeRecordOptions = {}): GradeBatch {
  let raw: unknown
  try {
    raw = parse(text, {
      bom: true,
      delimiter: options.delimiter ?? ',',
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    })
  } catch (e) {
    throw new PsfError('MALFORMED_INPUT', `could not parse grade records: ${errorMessage(e)}`, { cause: e })
  }

  const records = RecordsSchema.parse(raw)
  const header = options.schema ?? records[0]
  if (!header) {
    throw new PsfError('MALFORMED_INPUT', 'grade records are empty, expected a header line')
  }
  const firstDataLine = options.schema ? 1 : 2
  const dataRecords = options.schema ? records : records.slice(1)

  const duplicate = header.find((name, index) => header.indexOf(name) !== index)
  if (duplicate !== undefined) {
    throw new PsfError('MALFORMED_INPUT', `header names column '${duplicate}' more than once`)
  }
  if (!header.includes(OVERRIDE_FIELD)) {
    throw new PsfError('MALFORMED_INPUT', `header must contain an '${OVERRIDE_FIELD}' column`)
  }

  const keyFields = header.filter(isIdentityField)
  if (keyFields.length === 0) {
    throw new PsfError('MALFORMED_INPUT', `header must specify at least one of: ${IDENTITY_FIELDS.join(', ')}`)
  }
  const unsupported = header.filter((name) => name !== OVERRIDE_FIELD && name !== FEEDBACK_FIELD && !isIdentityField(name))
  if (unsupported.length) {
    throw new PsfError(
      'MALFORMED_INPUT',
      `unsupported column(s) ${unsupported.map((n) => `'${n}'`).join(', ')}, expected ${[...IDENTITY_FIELDS, OVERRIDE_FIELD, FEEDBACK_FIELD].join(', ')}`
    )
  }
  const feedbackIndex = header.indexOf(FEEDBACK_FIELD)

  const rows = dataRecords.map((record, index): GradeRow => {
    const line = firstDataLine + index
    if (record.length !== header.length) {
      throw new PsfError(
        'MALFORMED_INPUT',
        `record ${line} has ${record.length} fields, header has ${header.length}`
      )
    }

    const key: Partial<IdentityKey> = {}
    for (const field of keyFields) key[field] = record[header.indexOf(field)]

    const rawScore = record[header.indexOf(OVERRIDE_FIELD)]
    const override = rawScore === '' ? NaN : Number(rawScore)
    if (!Number.isFinite(override)) {
      throw new PsfError('MALFORMED_INPUT', `record ${line}: override '${rawScore}' is not a number`)
    }

    const feedback = feedbackIndex >= 0 ? record[feedbackIndex] : ''
    return feedback ? { line, key, override, feedback } : { line, key, override }
  })

  log.debug(`parsed ${rows.length} grade records keyed on ${keyFields.join(', ')}`)
  return { keyFields, rows }
}

export function readGradeRecords(filePath: string, options: GradeRecordOptions = {}): GradeBatch {
  let text: string
  try {
    text = fs.readFileSync(filePath, 'utf8')
  } catch (e) {
    if (isMissingFileError(e)) throw new PsfError('NOT_FOUND', `grade input '${filePath}' does not exist`, { cause: e })
    throw new PsfError('IO_ERROR', `could not read grade input '${filePath}': ${errorMessage(e)}`, { cause: e })
  }
  return parseGradeRecords(text, options)
}
