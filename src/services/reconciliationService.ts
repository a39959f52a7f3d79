/**
 * Grade import reconciliation
 *
 * Applies a batch of grade rows to a set of archives, all or nothing:
 *
 * 1. read the metadata of every candidate archive
 * 2. plan: match each row to exactly one archive and resolve its component
 *    against the archive's course definition
 * 3. if any row is unmatched, ambiguous or misconfigured, stop with zero writes
 * 4. open every staged archive and build its new ledger (all of that
 *    archive's rows folded into one revision); if any archive fails to open,
 *    stop with zero writes
 * 5. save every prepared archive
 *
 * Running the same batch twice leaves the scorecards unchanged but appends a
 * second revision, so every import run stays in the audit trail.
 */

import path from 'path'
import { Archive } from '../models/Archive'
import { CourseCatalog } from '../models/Course'
import { IdentityField, IdentityKey, MetadataRecord, formatIdentityKey, getField, identityKeyOf } from '../models/Metadata'
import { BatchResult, CommitFailure, commitBatch } from '../utils/batchUtils'
import { PsfErrorCode, errorMessage } from '../utils/errors'
import { GradeBatch, GradeRow } from '../utils/gradeRecords'
import { appendRevision } from '../utils/ledgerUtils'
import { createLogger } from '../utils/logger'
import { openArchive, readMetadata, saveArchive } from './archiveStore'

const log = createLogger('Import')

export interface ArchiveIndexEntry {
  path: string
  metadata: MetadataRecord
}

export type IssueKind = 'unmatched' | 'ambiguous' | 'configuration'

export interface ReconciliationIssue {
  kind: IssueKind
  code: PsfErrorCode
  line: number
  key: Partial<IdentityKey>
  candidates: string[]
  message: string
}

export interface PlannedUpdate {
  path: string
  contributions: Record<string, number>
  /** Latest non-empty feedback among the archive's rows */
  feedback?: string
  lines: number[]
}

export interface ReconciliationPlan {
  issues: ReconciliationIssue[]
  updates: PlannedUpdate[]
  skipped: GradeRow[]
}

export interface ReconcileOptions {
  /** Skip rows that match no archive instead of failing the batch */
  allowUnmatched?: boolean
  /** Plan only, write nothing */
  dryRun?: boolean
  /** Stored on every revision this run appends */
  note?: string
  now?: Date
}

export interface AppliedUpdate {
  path: string
  sequence: number
  contributions: Record<string, number>
}

export interface ReconciliationResult {
  success: boolean
  dryRun: boolean
  issues: ReconciliationIssue[]
  planned: PlannedUpdate[]
  applied: AppliedUpdate[]
  skipped: number
  failures: CommitFailure[]
}

export function findCandidates(
  entries: readonly ArchiveIndexEntry[],
  key: Partial<IdentityKey>,
  keyFields: readonly IdentityField[]
): ArchiveIndexEntry[] {
  return entries.filter((entry) =>
    keyFields.every((field) => {
      const value = getField(entry.metadata, field)
      return value !== undefined && value === key[field]
    })
  )
}

/** Full identity keys shared by more than one archive */
export function duplicateIdentities(entries: readonly ArchiveIndexEntry[]): Map<string, string[]> {
  const byKey = new Map<string, string[]>()
  for (const entry of entries) {
    const key = identityKeyOf(entry.metadata)
    if (!key) continue
    const id = formatIdentityKey(key)
    byKey.set(id, [...(byKey.get(id) ?? []), entry.path])
  }
  return new Map([...byKey].filter(([, paths]) => paths.length > 1))
}

/**
 * Pure planning step. Performs no I/O; the returned updates are only valid
 * when issues is empty.
 */
export function planReconciliation(
  entries: readonly ArchiveIndexEntry[],
  batch: GradeBatch,
  catalog: CourseCatalog,
  options: Pick<ReconcileOptions, 'allowUnmatched'> = {}
): ReconciliationPlan {
  const issues: ReconciliationIssue[] = []
  const skipped: GradeRow[] = []
  const staged = new Map<string, { contributions: Map<string, number>; feedback?: string; lines: number[] }>()

  for (const row of batch.rows) {
    const candidates = findCandidates(entries, row.key, batch.keyFields)
    const described = formatIdentityKey(row.key)
    const issue = (kind: IssueKind, code: PsfErrorCode, message: string) =>
      issues.push({ kind, code, line: row.line, key: row.key, candidates: candidates.map((c) => c.path), message })

    if (candidates.length === 0) {
      if (options.allowUnmatched) {
        log.warn(`record ${row.line} (${described}) matches no archive, skipping`)
        skipped.push(row)
      } else {
        issue('unmatched', 'AMBIGUOUS_MATCH', `record ${row.line} (${described}) matches no archive`)
      }
      continue
    }

    if (candidates.length > 1) {
      issue('ambiguous', 'AMBIGUOUS_MATCH', `record ${row.line} (${described}) matches ${candidates.length} archives`)
      continue
    }

    const [target] = candidates
    const courseName = getField(target.metadata, 'course')
    const component = getField(target.metadata, 'assignment')
    const course = courseName === undefined ? undefined : catalog.get(courseName)
    if (!course) {
      issue('configuration', 'CONFIGURATION_ERROR', `record ${row.line}: no course definition named '${courseName}'`)
      continue
    }
    if (component === undefined || !course.components.has(component)) {
      issue('configuration', 'CONFIGURATION_ERROR', `record ${row.line}: course '${course.name}' does not define component '${component}'`)
      continue
    }

    const entry = staged.get(target.path) ?? { contributions: new Map<string, number>(), lines: [] }
    entry.contributions.set(component, row.override)
    if (row.feedback) entry.feedback = row.feedback
    entry.lines.push(row.line)
    staged.set(target.path, entry)
  }

  if (issues.length) {
    return { issues, updates: [], skipped }
  }

  const updates = [...staged.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([target, { contributions, feedback, lines }]): PlannedUpdate => ({
      path: target,
      contributions: Object.fromEntries(contributions),
      ...(feedback ? { feedback } : {}),
      lines,
    }))

  return { issues, updates, skipped }
}

export async function loadArchiveIndex(archivePaths: readonly string[]): Promise<ArchiveIndexEntry[]> {
  return Promise.all(archivePaths.map(async (archivePath) => ({ path: archivePath, metadata: await readMetadata(archivePath) })))
}

interface PreparedWrite {
  update: PlannedUpdate
  archive: Archive
}

/**
 * Open every staged archive and build its next ledger. Nothing is written;
 * a failure on any archive is reported for all of them before the commit.
 */
async function prepareWrites(
  updates: readonly PlannedUpdate[],
  options: ReconcileOptions
): Promise<{ prepared: PreparedWrite[]; failures: CommitFailure[] }> {
  const settled = await Promise.allSettled(updates.map(async (update): Promise<PreparedWrite> => {
    const archive = await openArchive(update.path)
    const ledger = appendRevision(archive.ledger, update.contributions, {
      kind: 'import',
      feedback: update.feedback,
      note: options.note,
      now: options.now,
    })
    return { update, archive: { ...archive, ledger } }
  }))

  const prepared: PreparedWrite[] = []
  const failures: CommitFailure[] = []
  settled.forEach((outcome, index) => {
    if (outcome.status === 'fulfilled') {
      prepared.push(outcome.value)
    } else {
      failures.push({ target: updates[index].path, error: errorMessage(outcome.reason) })
    }
  })
  return { prepared, failures }
}

export async function reconcile(
  archivePaths: readonly string[],
  batch: GradeBatch,
  catalog: CourseCatalog,
  options: ReconcileOptions = {}
): Promise<ReconciliationResult> {
  const dryRun = options.dryRun ?? false
  const uniquePaths = [...new Set(archivePaths.map((p) => path.resolve(p)))]

  // Any read failure propagates from here, before anything is written.
  const entries = await loadArchiveIndex(uniquePaths)
  log.info(`loaded ${entries.length} archives, ${batch.rows.length} records`)

  for (const [key, paths] of duplicateIdentities(entries)) {
    log.debug(`archives sharing identity ${key}: ${paths.join(', ')}`)
  }

  const plan = planReconciliation(entries, batch, catalog, options)
  const base = { dryRun, issues: plan.issues, planned: plan.updates, skipped: plan.skipped.length }

  if (plan.issues.length) {
    log.error(`refusing to apply batch: ${plan.issues.length} problem record(s), no archive was modified`)
    return { ...base, success: false, applied: [], failures: [] }
  }

  if (dryRun) {
    return { ...base, success: true, applied: [], failures: [] }
  }

  const { prepared, failures } = await prepareWrites(plan.updates, options)
  if (failures.length) {
    for (const failure of failures) log.error(`cannot update '${failure.target}': ${failure.error}`)
    log.error('refusing to apply batch, no archive was modified')
    return { ...base, success: false, applied: [], failures }
  }

  const result: BatchResult<AppliedUpdate> = await commitBatch(prepared.map(({ update, archive }) => ({
    target: update.path,
    commit: async () => {
      await saveArchive(archive)
      const sequence = archive.ledger[archive.ledger.length - 1].sequence
      log.debug(`'${update.path}' revision ${sequence}: ${JSON.stringify(update.contributions)}`)
      return { path: update.path, sequence, contributions: update.contributions }
    },
  })))

  return { ...base, success: result.success, applied: result.data, failures: result.failures }
}
