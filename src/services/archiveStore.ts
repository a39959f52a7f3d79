/**
 * Archive Store
 *
 * A PSF is a plain zip file:
 *
 *   psf/format_revision   container format revision (integer)
 *   psf/metadata.json     { id, metadata }
 *   psf/ledger.json       revision ledger
 *   psf/forensic.json     who/where/when the archive was packed
 *   submission/...        the submitted files
 *
 * New containers are streamed with archiver; existing ones are rewritten with
 * JSZip so the payload is carried over untouched. Every write goes to a
 * temporary sibling first and is renamed into place.
 *
 * Precondition: at most one process writes a given archive at a time. This
 * is not checked.
 */

import fs from 'fs'
import os from 'os'
import path from 'path'
import archiver from 'archiver'
import JSZip from 'jszip'
import { v4 as uuidv4 } from 'uuid'
import { z } from 'zod'
import { ARCHIVE_EXTENSION, IDENTITY_FIELDS, PSF_FORMAT_REVISION, SUBMISSION_CONFIG_FILE, TOOL_VERSION } from '../constants'
import { Archive, ForensicRecord, ForensicRecordSchema } from '../models/Archive'
import { IdentityKey, MetadataRecord, StoredMetadataSchema, getField, isReservedField } from '../models/Metadata'
import { Ledger, LedgerSchema } from '../models/Revision'
import { PsfError, errorMessage, isMissingFileError } from '../utils/errors'
import { isDirectory, tempSiblingPath, walkFiles } from '../utils/fsUtils'
import { appendRevision, validateLedger } from '../utils/ledgerUtils'
import { createLogger } from '../utils/logger'
import { assertToolVersion, loadSubmissionConfig } from '../utils/submissionConfig'

const log = createLogger('Archive')

const ENTRY_FORMAT = 'psf/format_revision'
const ENTRY_METADATA = 'psf/metadata.json'
const ENTRY_LEDGER = 'psf/ledger.json'
const ENTRY_FORENSIC = 'psf/forensic.json'
const PAYLOAD_DIR = 'submission'

export interface CreateArchiveOptions {
  /** Directory holding the submitted files */
  source: string
  /** Fields given explicitly; they win over the submission config */
  metadata?: Partial<Record<string, string>>
  /** Output directory, defaults to the parent of source */
  destination?: string
  /** Output file name, defaults to defaultArchiveName(metadata) */
  name?: string
  overwrite?: boolean
  allowNoConfig?: boolean
  disableVersionCheck?: boolean
  now?: Date
}

// ---------------------------------------------------------------------------
// Reading

async function loadZip(archivePath: string): Promise<JSZip> {
  let buffer: Buffer
  try {
    buffer = await fs.promises.readFile(archivePath)
  } catch (e) {
    if (isMissingFileError(e)) throw new PsfError('NOT_FOUND', `archive '${archivePath}' does not exist`, { cause: e })
    throw new PsfError('IO_ERROR', `could not read archive '${archivePath}': ${errorMessage(e)}`, { cause: e })
  }

  try {
    return await JSZip.loadAsync(buffer)
  } catch (e) {
    throw new PsfError('CORRUPT', `'${archivePath}' is not a readable zip archive: ${errorMessage(e)}`, { cause: e })
  }
}

async function readText(zip: JSZip, entry: string): Promise<string | null> {
  const file = zip.file(entry)
  if (!file) return null
  return file.async('text')
}

async function readJsonEntry<T>(
  zip: JSZip,
  entry: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  archivePath: string
): Promise<T> {
  const text = await readText(zip, entry)
  if (text === null) {
    throw new PsfError('CORRUPT', `archive '${archivePath}' has no ${entry}`)
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (e) {
    throw new PsfError('CORRUPT', `archive '${archivePath}': ${entry} is not valid JSON`, { cause: e })
  }

  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new PsfError('CORRUPT', `archive '${archivePath}': invalid ${entry} (${detail})`)
  }
  return parsed.data
}

async function readFormatRevision(zip: JSZip, archivePath: string): Promise<number> {
  const text = await readText(zip, ENTRY_FORMAT)
  if (text === null) {
    log.warn(`archive '${archivePath}' does not declare a format revision, assuming 0`)
    return 0
  }

  const revision = Number(text.trim())
  if (!Number.isInteger(revision) || revision < 0) {
    throw new PsfError('CORRUPT', `archive '${archivePath}' has an invalid format revision '${text.trim()}'`)
  }
  if (revision > PSF_FORMAT_REVISION) {
    throw new PsfError(
      'VERSION_INCOMPATIBLE',
      `archive '${archivePath}' uses format revision ${revision}; this tool reads up to ${PSF_FORMAT_REVISION}`
    )
  }
  return revision
}

async function readForensic(zip: JSZip, archivePath: string): Promise<ForensicRecord | null> {
  try {
    return await readJsonEntry(zip, ENTRY_FORENSIC, ForensicRecordSchema, archivePath)
  } catch (e) {
    log.warn(`archive '${archivePath}' has missing or invalid forensic data: ${errorMessage(e)}`)
    return null
  }
}

/**
 * Load metadata and ledger. Payload entries stay compressed until
 * listPayload or extractPayload asks for them.
 */
export async function openArchive(archivePath: string): Promise<Archive> {
  log.debug(`opening '${archivePath}'`)
  const zip = await loadZip(archivePath)
  const formatRevision = await readFormatRevision(zip, archivePath)
  const stored = await readJsonEntry(zip, ENTRY_METADATA, StoredMetadataSchema, archivePath)
  const ledger: Ledger = await readJsonEntry(zip, ENTRY_LEDGER, LedgerSchema, archivePath)
  validateLedger(ledger, `archive '${archivePath}'`)
  const forensic = await readForensic(zip, archivePath)

  return {
    path: archivePath,
    id: stored.id,
    formatRevision,
    metadata: Object.freeze({ ...stored.metadata }),
    ledger: Object.freeze(ledger),
    forensic,
  }
}

/** Metadata only, for callers that do not need the ledger yet */
export async function readMetadata(archivePath: string): Promise<MetadataRecord> {
  const zip = await loadZip(archivePath)
  await readFormatRevision(zip, archivePath)
  const stored = await readJsonEntry(zip, ENTRY_METADATA, StoredMetadataSchema, archivePath)
  return Object.freeze({ ...stored.metadata })
}

export function readMetadataField(archive: Archive, name: string): string | undefined {
  return getField(archive.metadata, name)
}

// ---------------------------------------------------------------------------
// Writing

async function replaceFile(target: string, write: (tempPath: string) => Promise<void>) {
  const tempPath = tempSiblingPath(target, uuidv4())
  try {
    await write(tempPath)
    await fs.promises.rename(tempPath, target)
  } catch (e) {
    await fs.promises.rm(tempPath, { force: true })
    if (e instanceof PsfError) throw e
    throw new PsfError('IO_ERROR', `could not write '${target}': ${errorMessage(e)}`, { cause: e })
  }
}

const serializeMetadata = (archive: Pick<Archive, 'id' | 'metadata'>) =>
  JSON.stringify({ id: archive.id, metadata: archive.metadata }, null, 2)

const serializeLedger = (ledger: Ledger) => JSON.stringify(ledger, null, 2)

/**
 * Write the archive's metadata and complete ledger back to its container.
 * The payload and any unknown entries are preserved.
 */
export async function saveArchive(archive: Archive): Promise<void> {
  validateLedger(archive.ledger, `archive '${archive.path}'`)
  const zip = await loadZip(archive.path)

  zip.file(ENTRY_FORMAT, String(PSF_FORMAT_REVISION))
  zip.file(ENTRY_METADATA, serializeMetadata(archive))
  zip.file(ENTRY_LEDGER, serializeLedger(archive.ledger))

  const buffer = await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' })
  await replaceFile(archive.path, (tempPath) => fs.promises.writeFile(tempPath, buffer))
  log.debug(`saved '${archive.path}' (${archive.ledger.length} revisions)`)
}

export function defaultArchiveName(key: IdentityKey): string {
  return `${key.semester}-${key.course}-${key.section}-${key.group}-${key.assignment}${ARCHIVE_EXTENSION}`
}

function assertFieldName(field: string) {
  if (isReservedField(field)) {
    throw new PsfError('MALFORMED_INPUT', `'${field}' is reserved and cannot be used as a metadata field name`)
  }
}

function definedFields(fields: Partial<Record<string, string>>): Record<string, string> {
  return Object.fromEntries(
    Object.entries(fields).filter((entry): entry is [string, string] => entry[1] !== undefined)
  )
}

function currentUser(): string {
  try {
    return os.userInfo().username
  } catch {
    return process.env.USER ?? process.env.USERNAME ?? 'unknown'
  }
}

// Paths below the source directory that the payload glob must skip
function relativeInside(source: string, target: string): string | null {
  const rel = path.relative(source, target)
  if (!rel || rel.startsWith('..') || path.isAbsolute(rel)) return null
  return rel.split(path.sep).join('/')
}

function writeContainer(tempPath: string, fill: (archive: archiver.Archiver) => void): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const output = fs.createWriteStream(tempPath)
    const archive = archiver('zip', { zlib: { level: 9 } })

    output.on('close', () => resolve())
    output.on('error', reject)
    archive.on('error', reject)
    archive.on('warning', (err) => log.warn(`while packing '${tempPath}': ${err.message}`))

    archive.pipe(output)
    fill(archive)
    archive.finalize().catch(reject)
  })
}

/**
 * Pack a submission directory into a new archive. Nothing is written when
 * validation fails, and an existing file is left alone unless overwrite is
 * set.
 */
export async function createArchive(options: CreateArchiveOptions): Promise<Archive> {
  const source = path.resolve(options.source)
  if (!isDirectory(source)) {
    throw new PsfError('NOT_FOUND', `submission source '${options.source}' is not a directory`)
  }

  const config = loadSubmissionConfig(source)
  const flags: string[] = []
  if (config) {
    log.debug(`loaded submission config '${config.path}'`)
    if (options.disableVersionCheck) {
      try {
        assertToolVersion(config)
      } catch (e) {
        log.warn(`ignoring version mismatch: ${errorMessage(e)}`)
      }
      flags.push('disable_version_check')
    } else {
      assertToolVersion(config)
    }
  } else if (options.allowNoConfig) {
    log.warn(`packing '${source}' without a submission config`)
    flags.push('allow_no_config')
  } else {
    throw new PsfError('NOT_FOUND', `'${path.join(source, SUBMISSION_CONFIG_FILE)}' does not exist, refusing to create archive`)
  }

  const merged: Record<string, string> = {
    ...definedFields(config?.metadata ?? {}),
    ...definedFields(options.metadata ?? {}),
  }

  Object.keys(merged).forEach(assertFieldName)

  const missing = IDENTITY_FIELDS.filter((field) => !getField(merged, field))
  if (missing.length) {
    throw new PsfError('MALFORMED_INPUT', `missing required metadata: ${missing.join(', ')}`)
  }

  const key: IdentityKey = {
    semester: merged.semester,
    course: merged.course,
    section: merged.section,
    group: merged.group,
    assignment: merged.assignment,
  }

  if (config && config.validAssignments.length && !config.validAssignments.includes(key.assignment)) {
    throw new PsfError(
      'MALFORMED_INPUT',
      `invalid assignment name '${key.assignment}', valid choices are: ${config.validAssignments.join(', ')}`
    )
  }

  const now = options.now ?? new Date()
  const metadata: MetadataRecord = {
    ...merged,
    timestamp: now.toISOString(),
    tool_version: TOOL_VERSION,
  }

  const destination = path.resolve(options.destination ?? path.dirname(source))
  const outputPath = path.join(destination, options.name ?? defaultArchiveName(key))

  if (fs.existsSync(outputPath) && !options.overwrite) {
    throw new PsfError('ALREADY_EXISTS', `output file '${outputPath}' exists, refusing to overwrite`)
  }

  const forensic: ForensicRecord = {
    hostname: os.hostname(),
    user: currentUser(),
    sourceDir: source,
    toolVersion: TOOL_VERSION,
    timestamp: now.toISOString(),
    flags,
  }
  const id = uuidv4()

  await replaceFile(outputPath, (tempPath) => {
    const ignore = [...(config?.exclude ?? [])]
    for (const own of [outputPath, tempPath]) {
      const rel = relativeInside(source, own)
      if (rel) ignore.push(rel)
    }

    return writeContainer(tempPath, (archive) => {
      archive.append(String(PSF_FORMAT_REVISION), { name: ENTRY_FORMAT })
      archive.append(serializeMetadata({ id, metadata }), { name: ENTRY_METADATA })
      archive.append(serializeLedger([]), { name: ENTRY_LEDGER })
      archive.append(JSON.stringify(forensic, null, 2), { name: ENTRY_FORENSIC })
      archive.glob('**/*', { cwd: source, ignore, dot: true, nodir: true }, { prefix: PAYLOAD_DIR })
    })
  })

  log.info(`archive written to '${outputPath}'`)
  return openArchive(outputPath)
}

/**
 * Set (or insert) one metadata field. Returns a new archive value with the
 * change recorded as a metadata revision; persist it with saveArchive.
 */
export function modifyMetadata(archive: Archive, field: string, value: string, now?: Date): Archive {
  if (!field.trim()) {
    throw new PsfError('MALFORMED_INPUT', 'metadata field name must not be empty')
  }
  assertFieldName(field)

  return {
    ...archive,
    metadata: Object.freeze({ ...archive.metadata, [field]: value }),
    ledger: appendRevision(archive.ledger, {}, { kind: 'metadata', metadataChanges: { [field]: value }, now }),
  }
}

// ---------------------------------------------------------------------------
// Payload

function payloadEntries(zip: JSZip): Array<{ name: string; file: JSZip.JSZipObject }> {
  const prefix = `${PAYLOAD_DIR}/`
  const entries: Array<{ name: string; file: JSZip.JSZipObject }> = []
  zip.forEach((relativePath, file) => {
    if (!file.dir && relativePath.startsWith(prefix)) {
      entries.push({ name: relativePath.slice(prefix.length), file })
    }
  })
  return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
}

export async function listPayload(archivePath: string): Promise<string[]> {
  const zip = await loadZip(archivePath)
  return payloadEntries(zip).map((entry) => entry.name)
}

/** Write the submitted files below destination; returns the paths written */
export async function extractPayload(archivePath: string, destination: string): Promise<string[]> {
  const zip = await loadZip(archivePath)
  const root = path.resolve(destination)
  const written: string[] = []

  for (const { name, file } of payloadEntries(zip)) {
    const target = path.resolve(root, name)
    if (!relativeInside(root, target)) {
      throw new PsfError('CORRUPT', `archive '${archivePath}' contains an unsafe path '${name}'`)
    }
    await fs.promises.mkdir(path.dirname(target), { recursive: true })
    await fs.promises.writeFile(target, await file.async('nodebuffer'))
    written.push(target)
  }

  log.debug(`extracted ${written.length} files to '${root}'`)
  return written
}

// ---------------------------------------------------------------------------
// Collections

/**
 * Expand archive files and directories (searched recursively for *.psf) into
 * a sorted list of unique absolute paths.
 */
export function collectArchivePaths(inputs: string[]): string[] {
  const found = new Set<string>()
  for (const input of inputs) {
    if (isDirectory(input)) {
      walkFiles(input, ARCHIVE_EXTENSION).forEach((file) => found.add(file))
    } else if (fs.existsSync(input)) {
      found.add(path.resolve(input))
    } else {
      throw new PsfError('NOT_FOUND', `'${input}' does not exist`)
    }
  }
  return [...found].sort()
}
