/**
 * Failure categories surfaced by every tool. The CLI maps any of them to a
 * nonzero exit status.
 */
export type PsfErrorCode =
  | 'NOT_FOUND'
  | 'ALREADY_EXISTS'
  | 'MALFORMED_INPUT'
  | 'VERSION_INCOMPATIBLE'
  | 'AMBIGUOUS_MATCH'
  | 'CONFIGURATION_ERROR'
  | 'CORRUPT'
  | 'IO_ERROR'
  | 'QUERY_ERROR'

export class PsfError extends Error {
  readonly code: PsfErrorCode

  constructor(code: PsfErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PsfError'
    this.code = code
  }
}

export function isPsfError(error: unknown, code?: PsfErrorCode): error is PsfError {
  return error instanceof PsfError && (code === undefined || error.code === code)
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}

export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
