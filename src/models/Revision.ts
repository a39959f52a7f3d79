import { z } from 'zod'

export type RevisionKind = 'import' | 'metadata'

export interface Revision {
  sequence: number
  kind: RevisionKind
  /** Component name to score, as reported for this revision only */
  contributions: Readonly<Record<string, number>>
  /** Present on metadata revisions: the fields that were set */
  metadataChanges?: Readonly<Record<string, string>>
  /** Instructor feedback sent with an import */
  feedback?: string
  note?: string
  timestamp: string
}

export type Ledger = readonly Revision[]

export type Scorecard = ReadonlyMap<string, number>

export const RevisionSchema = z.object({
  sequence: z.number().int().nonnegative(),
  kind: z.enum(['import', 'metadata']),
  contributions: z.record(z.string(), z.number().finite()),
  metadataChanges: z.record(z.string(), z.string()).optional(),
  feedback: z.string().optional(),
  note: z.string().optional(),
  timestamp: z.string().min(1),
})

export const LedgerSchema = z.array(RevisionSchema)
