/**
 * Batch commit utilities
 *
 * Many independent files are updated as one batch in two phases: a pure
 * planning phase produces a list of pending writes, and only a plan that
 * validated completely is handed to commitBatch. Nothing is written while
 * planning, so an aborted plan leaves every file as it was.
 *
 * Writes to different targets run concurrently. A target may appear only
 * once per batch so each file has a single writer.
 */

import { errorMessage } from './errors'
import { createLogger } from './logger'

const log = createLogger('Batch')

export interface PendingWrite<T> {
  /** File the write touches, used to enforce one writer per target */
  target: string
  commit: () => Promise<T>
}

export interface CommitFailure {
  target: string
  error: string
}

export interface BatchResult<T> {
  success: boolean
  data: T[]
  failures: CommitFailure[]
}

/**
 * Commit every pending write.
 *
 * @example
 * ```typescript
 * const result = await commitBatch(plan.map((p) => ({
 *   target: p.path,
 *   commit: () => saveArchive(p.archive),
 * })))
 *
 * if (!result.success) {
 *   console.error('[Batch] failed:', result.failures)
 * }
 * ```
 */
export async function commitBatch<T>(writes: PendingWrite<T>[]): Promise<BatchResult<T>> {
  const seen = new Set<string>()
  for (const write of writes) {
    if (seen.has(write.target)) {
      throw new Error(`batch contains more than one write for '${write.target}'`)
    }
    seen.add(write.target)
  }

  const settled = await Promise.allSettled(writes.map((write) => write.commit()))

  const data: T[] = []
  const failures: CommitFailure[] = []
  settled.forEach((outcome, index) => {
    const { target } = writes[index]
    if (outcome.status === 'fulfilled') {
      data.push(outcome.value)
    } else {
      failures.push({ target, error: errorMessage(outcome.reason) })
      log.error(`write to '${target}' failed: ${errorMessage(outcome.reason)}`)
    }
  })

  return { success: failures.length === 0, data, failures }
}
