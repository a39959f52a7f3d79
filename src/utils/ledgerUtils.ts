/**
 * Revision ledger logic
 *
 * A ledger is an append-only list of revisions. Nothing here mutates its
 * input: every operation returns a new value and callers swap references.
 * The current scorecard is a fold over the whole history where, for each
 * component, the revision with the highest sequence number wins.
 */

import { CourseDefinition } from '../models/Course'
import { Ledger, Revision, RevisionKind, Scorecard } from '../models/Revision'
import { PsfError } from './errors'

export interface AppendOptions {
  kind?: RevisionKind
  metadataChanges?: Record<string, string>
  feedback?: string
  note?: string
  now?: Date
}

export interface ScoreOptions {
  /** Skip components the course does not define instead of failing */
  tolerant?: boolean
}

export interface ScorecardFormatOptions extends ScoreOptions {
  feedback?: string
}

export function nextSequence(ledger: Ledger): number {
  if (ledger.length === 0) return 0
  return ledger[ledger.length - 1].sequence + 1
}

export function appendRevision(
  ledger: Ledger,
  contributions: Readonly<Record<string, number>>,
  options: AppendOptions = {}
): Ledger {
  for (const [name, score] of Object.entries(contributions)) {
    if (!Number.isFinite(score)) {
      throw new PsfError('MALFORMED_INPUT', `score for component '${name}' is not a finite number`)
    }
  }

  const revision: Revision = {
    sequence: nextSequence(ledger),
    kind: options.kind ?? 'import',
    contributions: { ...contributions },
    ...(options.metadataChanges ? { metadataChanges: { ...options.metadataChanges } } : {}),
    ...(options.feedback ? { feedback: options.feedback } : {}),
    ...(options.note ? { note: options.note } : {}),
    timestamp: (options.now ?? new Date()).toISOString(),
  }

  return Object.freeze([...ledger, Object.freeze(revision)])
}

/**
 * Throws CORRUPT unless sequence numbers run 0, 1, 2, ... without gaps.
 */
export function validateLedger(ledger: Ledger, source = 'ledger') {
  ledger.forEach((revision, index) => {
    if (revision.sequence !== index) {
      throw new PsfError(
        'CORRUPT',
        `${source}: revision at position ${index} has sequence ${revision.sequence}, expected ${index}`
      )
    }
  })
}

export function currentScorecard(ledger: Ledger, uptoSequence?: number): Scorecard {
  const ordered = [...ledger].sort((a, b) => a.sequence - b.sequence)
  const scorecard = new Map<string, number>()
  for (const revision of ordered) {
    if (uptoSequence !== undefined && revision.sequence > uptoSequence) break
    for (const [name, score] of Object.entries(revision.contributions)) {
      scorecard.set(name, score)
    }
  }
  return scorecard
}

/** Feedback of the latest revision (up to uptoSequence) that carries any */
export function currentFeedback(ledger: Ledger, uptoSequence?: number): string | undefined {
  let feedback: string | undefined
  for (const revision of [...ledger].sort((a, b) => a.sequence - b.sequence)) {
    if (uptoSequence !== undefined && revision.sequence > uptoSequence) break
    if (revision.feedback) feedback = revision.feedback
  }
  return feedback
}

/**
 * Weighted average of the scorecard over the weights of the components it
 * contains. When those weights add up to 1 this is the plain sum of
 * score * weight.
 */
export function overallScore(scorecard: Scorecard, course: CourseDefinition, options: ScoreOptions = {}): number {
  let weighted = 0
  let totalWeight = 0

  for (const [name, score] of scorecard) {
    const component = course.components.get(name)
    if (!component) {
      if (options.tolerant) continue
      throw new PsfError('CONFIGURATION_ERROR', `component '${name}' is not defined by course '${course.name}'`)
    }
    weighted += score * component.weight
    totalWeight += component.weight
  }

  return totalWeight > 0 ? weighted / totalWeight : 0
}

const byName = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0)

export const formatPercent = (fraction: number) => `${(fraction * 100).toFixed(2)}%`

export function formatScorecard(scorecard: Scorecard, course: CourseDefinition, options: ScorecardFormatOptions = {}): string {
  const overall = overallScore(scorecard, course, options)
  const lines = [`SCORECARD FOR COURSE ${course.name}`]
  if (options.feedback) lines.push('', options.feedback, '')

  for (const name of [...scorecard.keys()].sort(byName)) {
    const component = course.components.get(name)
    if (!component) continue
    const score = scorecard.get(name) ?? 0
    lines.push(`${name} (${component.displayName}): ${formatPercent(score)} weight ${component.weight}`)
  }

  lines.push(`OVERALL SCORE: ${formatPercent(overall)}`)
  return lines.join('\n') + '\n'
}

export function formatLedger(ledger: Ledger): string {
  return ledger.map((revision) => {
    const changes = revision.kind === 'metadata'
      ? Object.entries(revision.metadataChanges ?? {}).map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      : Object.entries(revision.contributions).sort(([a], [b]) => byName(a, b)).map(([k, v]) => `${k}=${v}`)
    if (revision.feedback) changes.push(`feedback=${JSON.stringify(revision.feedback)}`)
    const note = revision.note ? ` # ${revision.note}` : ''
    return `${revision.sequence}\t${revision.timestamp}\t${revision.kind}\t${changes.join(' ')}${note}`
  }).join('\n')
}
