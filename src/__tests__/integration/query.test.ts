import fs from 'fs'
import path from 'path'
import { openArchive, saveArchive } from '../../services/archiveStore'
import { buildTable, runQuery } from '../../services/queryService'
import { CourseCatalog } from '../../models/Course'
import { appendRevision } from '../../utils/ledgerUtils'
import { TOOL_VERSION } from '../../constants'
import { cleanupTestWorkspaces, createTestArchive, createTestWorkspace, quietLogs } from '../../test/utils'

const catalog: CourseCatalog = new Map([
  ['A', { name: 'A', components: new Map([['D', { name: 'D', displayName: 'D', weight: 0.5 }]]) }],
])

async function grade(archivePath: string, score: number) {
  const archive = await openArchive(archivePath)
  await saveArchive({ ...archive, ledger: appendRevision(archive.ledger, { D: score }) })
}

describe('query service', () => {
  beforeAll(() => {
    quietLogs()
  })

  afterEach(() => {
    cleanupTestWorkspaces()
  })

  it('selects archives by section', async () => {
    const root = createTestWorkspace()
    await createTestArchive(root, { section: 'B1' })
    await createTestArchive(root, { section: 'B2' })
    await createTestArchive(root, { section: 'B2', course: 'X' })

    const result = await runQuery([root], 'SELECT course FROM psf WHERE section == "B2" ORDER BY course', catalog)
    expect(result).toEqual({ columns: ['course'], rows: [['A'], ['X']] })
  })

  it('exposes score, revisions and every metadata field', async () => {
    const root = createTestWorkspace()
    const graded = await createTestArchive(root, { section: 'B1' })
    const ungraded = await createTestArchive(root, { section: 'B2' })
    await grade(graded.path, 0.8)

    const result = await runQuery([root], 'SELECT path, revisions, score FROM psf ORDER BY path', catalog)
    expect(result.rows).toEqual([
      [graded.path, 1, 0.8],
      [ungraded.path, 0, null],
    ])

    const all = await runQuery([root], 'SELECT * FROM psf LIMIT 1', catalog)
    expect(all.columns).toEqual([
      'path', 'filename', 'id', 'revisions', 'graded', 'score',
      'semester', 'course', 'section', 'group', 'assignment',
      'forensic_hostname', 'forensic_user', 'forensic_source_dir', 'forensic_tool_version',
      'forensic_timestamp', 'forensic_allow_no_config', 'forensic_disable_version_check',
      'timestamp', 'tool_version',
    ])
  })

  it('exposes the file name, graded flag and forensic record', async () => {
    const root = createTestWorkspace()
    const graded = await createTestArchive(root, { section: 'B1' })
    await createTestArchive(root, { section: 'B2' })
    await grade(graded.path, 0.8)

    const result = await runQuery(
      [root],
      'SELECT filename, graded, forensic_tool_version, forensic_allow_no_config, forensic_disable_version_check FROM psf ORDER BY filename',
      catalog
    )
    expect(result.rows).toEqual([
      ['C-A-B1-E-D.psf', 1, TOOL_VERSION, 1, 0],
      ['C-A-B2-E-D.psf', 0, TOOL_VERSION, 1, 0],
    ])
  })

  it('gives NULL forensic columns for an archive without forensic data', async () => {
    const root = createTestWorkspace()
    const archive = await createTestArchive(root)
    const table = buildTable([{ ...archive, forensic: null }], catalog)

    const [row] = table.rows
    expect(['forensic_hostname', 'forensic_user', 'forensic_allow_no_config'].map((c) => row.get(c))).toEqual([null, null, null])
    expect(row.get('filename')).toBe('C-A-B-E-D.psf')
  })

  it('gives NULL scores for courses without a definition', async () => {
    const root = createTestWorkspace()
    const archive = await createTestArchive(root, { course: 'Z' })
    await grade(archive.path, 0.5)

    const result = await runQuery([root], 'SELECT score FROM psf WHERE score IS NULL', catalog)
    expect(result.rows).toEqual([[null]])
  })

  it('adds extra metadata fields as columns, NULL where absent', async () => {
    const root = createTestWorkspace()
    const first = await createTestArchive(root, { section: 'B1' })
    const second = await createTestArchive(root, { section: 'B2' })
    const table = buildTable([{ ...first, metadata: { ...first.metadata, late: 'yes' } }, second], catalog)

    expect(table.columns.slice(-3)).toEqual(['late', 'timestamp', 'tool_version'])
    expect(table.rows.map((row) => row.get('late'))).toEqual(['yes', null])
  })

  it('reports syntax errors before reading any archive', async () => {
    const root = createTestWorkspace()
    await expect(runQuery([path.join(root, 'missing')], 'SELECT FROM', catalog)).rejects.toMatchObject({ code: 'QUERY_ERROR' })
  })

  it('leaves nothing behind on disk', async () => {
    const root = createTestWorkspace()
    await createTestArchive(root)
    const before = fs.readdirSync(root).sort()
    const cwdBefore = fs.readdirSync(process.cwd()).sort()

    await runQuery([root], 'SELECT * FROM psf', catalog)
    expect(fs.readdirSync(root).sort()).toEqual(before)
    expect(fs.readdirSync(process.cwd()).sort()).toEqual(cwdBefore)
  })
})
