export * from './constants'
export * from './models/Archive'
export * from './models/Course'
export * from './models/Metadata'
export * from './models/Revision'
export * from './services/archiveStore'
export * from './services/exportService'
export * from './services/queryService'
export * from './services/reconciliationService'
export { loadConfig, AppConfig } from './config'
export { PsfError, PsfErrorCode, isPsfError } from './utils/errors'
export { commitBatch, BatchResult, PendingWrite } from './utils/batchUtils'
export { loadCourses, loadCourseDefinition, parseCourseDefinition } from './utils/courseDefinition'
export { parseGradeRecords, readGradeRecords, GradeBatch, GradeRow } from './utils/gradeRecords'
export {
  appendRevision,
  currentFeedback,
  currentScorecard,
  formatLedger,
  formatScorecard,
  overallScore,
  validateLedger,
} from './utils/ledgerUtils'
export { evaluateQuery, Table, ResultSet } from './utils/queryEvaluator'
export { parseQuery, Query, Expression, CellValue } from './utils/queryParser'
export { loadSubmissionConfig, SubmissionConfig } from './utils/submissionConfig'
export { formatTable, OutputFormat } from './utils/tableFormat'
