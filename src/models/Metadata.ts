import { z } from 'zod'
import { DERIVED_COLUMNS, FORENSIC_COLUMN_PREFIX, IDENTITY_FIELDS } from '../constants'

export type IdentityField = typeof IDENTITY_FIELDS[number]

/** (semester, course, section, group, assignment), compared exactly */
export type IdentityKey = Record<IdentityField, string>

export type MetadataRecord = Readonly<Record<string, string>>

export const MetadataRecordSchema = z.record(z.string(), z.string())

// Stored form of psf/metadata.json
export const StoredMetadataSchema = z.object({
  id: z.string().min(1),
  metadata: MetadataRecordSchema,
}).superRefine((value, ctx) => {
  for (const field of IDENTITY_FIELDS) {
    if (!Object.prototype.hasOwnProperty.call(value.metadata, field)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['metadata', field], message: `missing identity field '${field}'` })
    }
  }
})

export type StoredMetadata = z.infer<typeof StoredMetadataSchema>

export function isIdentityField(name: string): name is IdentityField {
  return (IDENTITY_FIELDS as readonly string[]).includes(name)
}

const OBJECT_KEYS = ['__proto__', 'constructor', 'prototype']

/**
 * Names a metadata field may not take: query columns derived from the
 * archive, and keys that do not survive a JSON round trip as plain data.
 */
export function isReservedField(name: string): boolean {
  return (DERIVED_COLUMNS as readonly string[]).includes(name)
    || name.startsWith(FORENSIC_COLUMN_PREFIX)
    || OBJECT_KEYS.includes(name)
}

export function getField(metadata: MetadataRecord, name: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(metadata, name) ? metadata[name] : undefined
}

export function identityKeyOf(metadata: MetadataRecord): IdentityKey | null {
  const semester = getField(metadata, 'semester')
  const course = getField(metadata, 'course')
  const section = getField(metadata, 'section')
  const group = getField(metadata, 'group')
  const assignment = getField(metadata, 'assignment')
  if (semester === undefined || course === undefined || section === undefined || group === undefined || assignment === undefined) {
    return null
  }
  return { semester, course, section, group, assignment }
}

export function formatIdentityKey(key: Partial<IdentityKey>): string {
  const parts = IDENTITY_FIELDS
    .filter((field) => key[field] !== undefined)
    .map((field) => `${field}=${JSON.stringify(key[field])}`)
  return parts.length ? parts.join(' ') : '(empty key)'
}
