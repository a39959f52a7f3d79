import { z } from 'zod'
import { MetadataRecord } from './Metadata'
import { Ledger } from './Revision'

export const ForensicRecordSchema = z.object({
  hostname: z.string(),
  user: z.string(),
  sourceDir: z.string(),
  toolVersion: z.string(),
  timestamp: z.string(),
  flags: z.array(z.string()).default([]),
})

export type ForensicRecord = z.infer<typeof ForensicRecordSchema>

/**
 * In-memory view of one container. Values are replaced, never edited:
 * operations that change an archive return a new object.
 */
export interface Archive {
  path: string
  id: string
  formatRevision: number
  metadata: MetadataRecord
  ledger: Ledger
  forensic: ForensicRecord | null
}
