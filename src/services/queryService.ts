/**
 * Query service
 *
 * Projects a set of archives into the read-only table `psf` (one row per
 * archive) and answers a single query against it. The table lives only for
 * the duration of the call; no database file is created.
 */

import path from 'path'
import { DERIVED_COLUMNS, FORENSIC_COLUMN_PREFIX, IDENTITY_FIELDS, QUERY_TABLE_NAME } from '../constants'
import { Archive, ForensicRecord } from '../models/Archive'
import { CourseCatalog } from '../models/Course'
import { getField } from '../models/Metadata'
import { currentScorecard, overallScore } from '../utils/ledgerUtils'
import { createLogger } from '../utils/logger'
import { ResultSet, Row, Table, evaluateQuery } from '../utils/queryEvaluator'
import { CellValue, parseQuery } from '../utils/queryParser'
import { collectArchivePaths, openArchive } from './archiveStore'

const log = createLogger('Query')

const FORENSIC_FIELDS = [
  'hostname',
  'user',
  'source_dir',
  'tool_version',
  'timestamp',
  'allow_no_config',
  'disable_version_check',
] as const

export const FORENSIC_COLUMNS = FORENSIC_FIELDS.map((field) => `${FORENSIC_COLUMN_PREFIX}${field}`)

/** Columns every row carries, ahead of the remaining metadata fields */
export const BASE_COLUMNS: readonly string[] = [...DERIVED_COLUMNS, ...IDENTITY_FIELDS, ...FORENSIC_COLUMNS]

function forensicCells(forensic: ForensicRecord | null): Record<typeof FORENSIC_FIELDS[number], CellValue> {
  if (!forensic) {
    return {
      hostname: null,
      user: null,
      source_dir: null,
      tool_version: null,
      timestamp: null,
      allow_no_config: null,
      disable_version_check: null,
    }
  }
  return {
    hostname: forensic.hostname,
    user: forensic.user,
    source_dir: forensic.sourceDir,
    tool_version: forensic.toolVersion,
    timestamp: forensic.timestamp,
    allow_no_config: forensic.flags.includes('allow_no_config') ? 1 : 0,
    disable_version_check: forensic.flags.includes('disable_version_check') ? 1 : 0,
  }
}

/** Overall score as a fraction, or null when ungraded or the course is unknown */
export function archiveScore(archive: Archive, catalog: CourseCatalog): number | null {
  const scorecard = currentScorecard(archive.ledger)
  if (scorecard.size === 0) return null

  const courseName = getField(archive.metadata, 'course')
  const course = courseName === undefined ? undefined : catalog.get(courseName)
  if (!course) {
    log.debug(`no course definition for '${archive.path}', score is NULL`)
    return null
  }
  return overallScore(scorecard, course, { tolerant: true })
}

export function buildTable(archives: readonly Archive[], catalog: CourseCatalog): Table {
  const base = BASE_COLUMNS
  const extra = new Set<string>()
  for (const archive of archives) {
    for (const field of Object.keys(archive.metadata)) {
      if (!base.includes(field)) extra.add(field)
    }
  }
  const columns = [...base, ...[...extra].sort()]

  const rows: Row[] = archives.map((archive) => {
    const row = new Map<string, CellValue>()
    for (const column of columns) row.set(column, getField(archive.metadata, column) ?? null)
    row.set('path', archive.path)
    row.set('filename', path.basename(archive.path))
    row.set('id', archive.id)
    row.set('revisions', archive.ledger.length)
    row.set('graded', currentScorecard(archive.ledger).size > 0 ? 1 : 0)
    row.set('score', archiveScore(archive, catalog))
    for (const [field, value] of Object.entries(forensicCells(archive.forensic))) {
      row.set(`${FORENSIC_COLUMN_PREFIX}${field}`, value)
    }
    return row
  })

  return { name: QUERY_TABLE_NAME, columns, rows }
}

export async function loadTable(paths: readonly string[], catalog: CourseCatalog): Promise<Table> {
  const archives = await Promise.all(paths.map((p) => openArchive(p)))
  return buildTable(archives, catalog)
}

/**
 * Parse the query first so a syntax error costs no archive reads, then load
 * every archive below inputs and evaluate.
 */
export async function runQuery(inputs: string[], text: string, catalog: CourseCatalog): Promise<ResultSet> {
  const query = parseQuery(text)
  const paths = collectArchivePaths(inputs)
  log.debug(`querying ${paths.length} archives`)
  const table = await loadTable(paths, catalog)
  return evaluateQuery(table, query)
}
