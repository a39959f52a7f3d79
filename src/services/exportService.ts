/**
 * Grade export
 *
 * Turns graded archives into one record each, in the column order Moodle's
 * grade import expects:
 *
 *   SEMESTER,COURSE,SECTION,GROUP,SCORE,FEEDBACK
 *
 * SCORE is the overall score on a 100 point scale with two decimals. An
 * ungraded archive exports a score of 0 and says so in its feedback.
 */

import { Archive } from '../models/Archive'
import { CourseCatalog } from '../models/Course'
import { getField } from '../models/Metadata'
import { requireCourse } from '../utils/courseDefinition'
import { currentFeedback, currentScorecard, overallScore } from '../utils/ledgerUtils'
import { createLogger } from '../utils/logger'
import { collectArchivePaths, openArchive } from './archiveStore'

const log = createLogger('Export')

export const EXPORT_COLUMNS = ['SEMESTER', 'COURSE', 'SECTION', 'GROUP', 'SCORE', 'FEEDBACK']

export const UNGRADED_FEEDBACK = 'No grade has been recorded for this assignment.'

const UNSPECIFIED = 'UNSPECIFIED'

export interface ExportRecord {
  semester: string
  course: string
  section: string
  group: string
  score: string
  feedback: string
}

export function exportRecord(archive: Archive, catalog: CourseCatalog): ExportRecord {
  const field = (name: string) => getField(archive.metadata, name) ?? UNSPECIFIED
  const feedback = [currentFeedback(archive.ledger) ?? getField(archive.metadata, 'feedback') ?? '']

  let score = 0
  const scorecard = currentScorecard(archive.ledger)
  if (scorecard.size > 0) {
    const course = requireCourse(catalog, field('course'))
    score = overallScore(scorecard, course) * 100
  } else {
    feedback.push(UNGRADED_FEEDBACK)
  }

  return {
    semester: field('semester'),
    course: field('course'),
    section: field('section'),
    group: field('group'),
    score: score.toFixed(2),
    feedback: feedback.filter(Boolean).join('\n'),
  }
}

export const recordCells = (record: ExportRecord): string[] =>
  [record.semester, record.course, record.section, record.group, record.score, record.feedback]

/** Export every archive below inputs, ordered by path */
export async function exportGrades(inputs: string[], catalog: CourseCatalog): Promise<ExportRecord[]> {
  const paths = collectArchivePaths(inputs)
  log.debug(`exporting ${paths.length} archives`)
  const archives = await Promise.all(paths.map((p) => openArchive(p)))
  return archives.map((archive) => exportRecord(archive, catalog))
}
