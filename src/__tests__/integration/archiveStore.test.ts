import fs from 'fs'
import path from 'path'
import JSZip from 'jszip'
import {
  collectArchivePaths,
  createArchive,
  defaultArchiveName,
  extractPayload,
  listPayload,
  modifyMetadata,
  openArchive,
  readMetadata,
  readMetadataField,
  saveArchive,
} from '../../services/archiveStore'
import { TOOL_VERSION } from '../../constants'
import {
  cleanupTestWorkspaces,
  createTestArchive,
  createTestWorkspace,
  quietLogs,
  sampleKey,
  writeFiles,
  writeSubmission,
} from '../../test/utils'

const fixedTime = new Date('2024-03-04T05:06:07.000Z')

const configToml = (extra: string[] = []) => [
  'semester = "C"',
  'course = "A"',
  'section = "B"',
  'group = "E"',
  'assignment = "D"',
  ...extra,
].join('\n') + '\n'

async function writeZip(file: string, entries: Record<string, string>) {
  const zip = new JSZip()
  for (const [name, content] of Object.entries(entries)) zip.file(name, content)
  fs.writeFileSync(file, await zip.generateAsync({ type: 'nodebuffer' }))
}

const validMetadata = JSON.stringify({ id: 'x', metadata: sampleKey })

describe('archive store', () => {
  beforeAll(() => {
    quietLogs()
  })

  afterEach(() => {
    cleanupTestWorkspaces()
  })

  it('names archives after their identity', () => {
    expect(defaultArchiveName(sampleKey)).toBe('C-A-B-E-D.psf')
  })

  describe('createArchive', () => {
    it('packs a submission and reads it back', async () => {
      const root = createTestWorkspace()
      const archive = await createTestArchive(root, {}, { now: fixedTime })

      expect(archive.path).toBe(path.join(root, 'C-A-B-E-D.psf'))
      expect(archive.formatRevision).toBe(1)
      expect(archive.ledger).toEqual([])
      expect(archive.metadata).toEqual({
        ...sampleKey,
        timestamp: '2024-03-04T05:06:07.000Z',
        tool_version: TOOL_VERSION,
      })
      expect(readMetadataField(archive, 'course')).toBe('A')
      expect(readMetadataField(archive, 'toString')).toBeUndefined()
      expect(archive.forensic).toMatchObject({ toolVersion: TOOL_VERSION, flags: ['allow_no_config'] })
      expect(await listPayload(archive.path)).toEqual(['file.txt'])
      expect(fs.readdirSync(root).sort()).toEqual(['C-A-B-E-D.psf', 'src-C-A-B-E-D'])
    })

    it('writes next to the source directory by default', async () => {
      const root = createTestWorkspace()
      const source = writeSubmission(root)
      const archive = await createArchive({ source, metadata: sampleKey, allowNoConfig: true })
      expect(archive.path).toBe(path.join(root, 'C-A-B-E-D.psf'))
    })

    it('takes identity fields from psf.toml and honours exclude', async () => {
      const root = createTestWorkspace()
      const source = writeSubmission(root, {
        'psf.toml': configToml(['exclude = ["*.log"]']),
        'main.c': 'int main(void) { return 0; }\n',
        'build.log': 'noise\n',
        'lib/util.c': '\n',
      })

      const archive = await createArchive({ source })
      expect(archive.metadata.assignment).toBe('D')
      expect(archive.forensic?.flags).toEqual([])
      expect(await listPayload(archive.path)).toEqual(['lib/util.c', 'main.c', 'psf.toml'])
    })

    it('lets explicit fields win over psf.toml', async () => {
      const root = createTestWorkspace()
      const source = writeSubmission(root, { 'psf.toml': configToml() })
      const archive = await createArchive({ source, metadata: { section: 'B2' } })
      expect(archive.metadata.section).toBe('B2')
      expect(path.basename(archive.path)).toBe('C-A-B2-E-D.psf')
    })

    it('does not pack itself when written inside the source', async () => {
      const root = createTestWorkspace()
      const source = writeSubmission(root)
      const archive = await createArchive({ source, destination: source, metadata: sampleKey, allowNoConfig: true })
      expect(await listPayload(archive.path)).toEqual(['file.txt'])
      expect(fs.readdirSync(source).sort()).toEqual(['C-A-B-E-D.psf', 'file.txt'])
    })

    it('refuses to replace an existing archive and leaves it untouched', async () => {
      const root = createTestWorkspace()
      const first = await createTestArchive(root)
      const before = fs.readFileSync(first.path)

      await expect(createTestArchive(root)).rejects.toMatchObject({ code: 'ALREADY_EXISTS' })
      expect(fs.readFileSync(first.path).equals(before)).toBe(true)
    })

    it('replaces an existing archive with overwrite', async () => {
      const root = createTestWorkspace()
      const first = await createTestArchive(root)
      const second = await createTestArchive(root, {}, { overwrite: true })
      expect(second.path).toBe(first.path)
      expect(second.id).not.toBe(first.id)
    })

    it('writes nothing when the installed version is too old', async () => {
      const root = createTestWorkspace()
      const source = writeSubmission(root, { 'psf.toml': configToml(['minimum_version = "999999.0.0"']) })

      await expect(createArchive({ source })).rejects.toMatchObject({ code: 'VERSION_INCOMPATIBLE' })
      expect(fs.readdirSync(root)).toEqual(['submission'])
    })

    it('can skip the version check and records that it did', async () => {
      const root = createTestWorkspace()
      const source = writeSubmission(root, { 'psf.toml': configToml(['minimum_version = "999999.0.0"']) })
      const archive = await createArchive({ source, disableVersionCheck: true })
      expect(archive.forensic?.flags).toEqual(['disable_version_check'])
    })

    it('requires a psf.toml unless told otherwise', async () => {
      const root = createTestWorkspace()
      const source = writeSubmission(root)
      await expect(createArchive({ source, metadata: sampleKey })).rejects.toMatchObject({ code: 'NOT_FOUND' })
    })

    it('requires every identity field', async () => {
      const root = createTestWorkspace()
      const source = writeSubmission(root)
      const { group, ...partial } = sampleKey
      expect(group).toBe('E')
      await expect(createArchive({ source, metadata: partial, allowNoConfig: true })).rejects.toThrow(
        'missing required metadata: group'
      )
    })

    it('refuses metadata fields named like query columns', async () => {
      const root = createTestWorkspace()
      const source = writeSubmission(root)
      await expect(createArchive({ source, metadata: { ...sampleKey, path: 'x' }, allowNoConfig: true })).rejects.toMatchObject({
        code: 'MALFORMED_INPUT',
        message: "'path' is reserved and cannot be used as a metadata field name",
      })
      expect(fs.readdirSync(root)).toEqual(['submission'])
    })

    it('checks the assignment against the allowed names', async () => {
      const root = createTestWorkspace()
      const source = writeSubmission(root, { 'psf.toml': configToml(['valid_assignment_names = ["hw1", "hw2"]']) })
      await expect(createArchive({ source })).rejects.toThrow(
        "invalid assignment name 'D', valid choices are: hw1, hw2"
      )
    })

    it('fails on a missing source directory', async () => {
      const root = createTestWorkspace()
      await expect(createArchive({ source: path.join(root, 'nope') })).rejects.toMatchObject({ code: 'NOT_FOUND' })
    })
  })

  describe('modifyMetadata and saveArchive', () => {
    it('records the change as a revision and keeps the payload', async () => {
      const root = createTestWorkspace()
      const archive = await createTestArchive(root)

      const changed = modifyMetadata(archive, 'foo', 'bar', fixedTime)
      expect(archive.metadata.foo).toBeUndefined()
      expect(archive.ledger).toEqual([])

      await saveArchive(changed)
      const reopened = await openArchive(archive.path)
      expect(reopened.id).toBe(archive.id)
      expect(reopened.metadata.foo).toBe('bar')
      expect(reopened.ledger).toEqual([{
        sequence: 0,
        kind: 'metadata',
        contributions: {},
        metadataChanges: { foo: 'bar' },
        timestamp: '2024-03-04T05:06:07.000Z',
      }])
      expect(await listPayload(archive.path)).toEqual(['file.txt'])
      expect(await readMetadata(archive.path)).toMatchObject({ foo: 'bar', course: 'A' })
    })

    it('overwrites an existing field', async () => {
      const root = createTestWorkspace()
      const archive = await createTestArchive(root)
      await saveArchive(modifyMetadata(archive, 'section', 'B2'))
      expect((await openArchive(archive.path)).metadata.section).toBe('B2')
    })

    it('rejects an empty field name', async () => {
      const root = createTestWorkspace()
      const archive = await createTestArchive(root)
      expect(() => modifyMetadata(archive, ' ', 'x')).toThrow('metadata field name must not be empty')
    })

    it('rejects reserved field names', async () => {
      const root = createTestWorkspace()
      const archive = await createTestArchive(root)
      for (const field of ['__proto__', 'score', 'revisions', 'graded', 'forensic_user']) {
        expect(() => modifyMetadata(archive, field, 'x')).toThrow(`'${field}' is reserved and cannot be used as a metadata field name`)
      }
    })

    it('leaves no temporary files behind', async () => {
      const root = createTestWorkspace()
      const archive = await createTestArchive(root)
      await saveArchive(modifyMetadata(archive, 'foo', 'bar'))
      expect(fs.readdirSync(root).filter((name) => name.endsWith('.tmp'))).toEqual([])
    })
  })

  describe('extractPayload', () => {
    it('writes the submitted files', async () => {
      const root = createTestWorkspace()
      const archive = await createTestArchive(root)
      const out = path.join(root, 'out')

      const written = await extractPayload(archive.path, out)
      expect(written).toEqual([path.join(out, 'file.txt')])
      expect(fs.readFileSync(path.join(out, 'file.txt'), 'utf8')).toBe('this is a test string!\n')
    })
  })

  describe('openArchive', () => {
    it('reports a missing file', async () => {
      const root = createTestWorkspace()
      await expect(openArchive(path.join(root, 'none.psf'))).rejects.toMatchObject({ code: 'NOT_FOUND' })
    })

    it('reports a file that is not a zip', async () => {
      const root = createTestWorkspace()
      writeFiles(root, { 'junk.psf': 'not a zip' })
      await expect(openArchive(path.join(root, 'junk.psf'))).rejects.toMatchObject({ code: 'CORRUPT' })
    })

    it('refuses a newer format revision', async () => {
      const root = createTestWorkspace()
      const file = path.join(root, 'future.psf')
      await writeZip(file, { 'psf/format_revision': '2', 'psf/metadata.json': validMetadata, 'psf/ledger.json': '[]' })
      await expect(openArchive(file)).rejects.toMatchObject({ code: 'VERSION_INCOMPATIBLE' })
    })

    it('refuses a ledger with a gap', async () => {
      const root = createTestWorkspace()
      const file = path.join(root, 'gap.psf')
      const ledger = JSON.stringify([{ sequence: 1, kind: 'import', contributions: { D: 0.5 }, timestamp: 't' }])
      await writeZip(file, { 'psf/format_revision': '1', 'psf/metadata.json': validMetadata, 'psf/ledger.json': ledger })
      await expect(openArchive(file)).rejects.toMatchObject({ code: 'CORRUPT' })
    })

    it('refuses metadata without the identity fields', async () => {
      const root = createTestWorkspace()
      const file = path.join(root, 'partial.psf')
      await writeZip(file, {
        'psf/format_revision': '1',
        'psf/metadata.json': JSON.stringify({ id: 'x', metadata: { course: 'A' } }),
        'psf/ledger.json': '[]',
      })
      await expect(openArchive(file)).rejects.toMatchObject({ code: 'CORRUPT' })
    })

    it('opens an archive without forensic data', async () => {
      const root = createTestWorkspace()
      const file = path.join(root, 'bare.psf')
      await writeZip(file, { 'psf/format_revision': '1', 'psf/metadata.json': validMetadata, 'psf/ledger.json': '[]' })
      const archive = await openArchive(file)
      expect(archive.forensic).toBeNull()
      expect(archive.id).toBe('x')
    })
  })

  describe('collectArchivePaths', () => {
    it('finds archives below directories, once each', async () => {
      const root = createTestWorkspace()
      const first = await createTestArchive(root)
      fs.mkdirSync(path.join(root, 'nested'))
      const second = await createTestArchive(path.join(root, 'nested'), { section: 'B2' })
      writeFiles(root, { 'notes.txt': 'x' })

      expect(collectArchivePaths([root, first.path])).toEqual([first.path, second.path].sort())
    })

    it('fails on a path that does not exist', () => {
      const root = createTestWorkspace()
      const gone = path.join(root, 'gone')
      expect(() => collectArchivePaths([gone])).toThrow(`'${gone}' does not exist`)
    })
  })
})
