#!/usr/bin/env node
import 'dotenv/config'
import path from 'path'
import { Command } from 'commander'
import { ARCHIVE_EXTENSION } from '../constants'
import { PsfError } from '../utils/errors'
import { loadCourses, requireCourse } from '../utils/courseDefinition'
import { currentFeedback, currentScorecard, formatLedger, formatScorecard } from '../utils/ledgerUtils'
import { createLogger } from '../utils/logger'
import { formatPairs } from '../utils/tableFormat'
import {
  createArchive,
  extractPayload,
  listPayload,
  modifyMetadata,
  openArchive,
  readMetadataField,
  saveArchive,
} from '../services/archiveStore'
import { createProgram, runCli, setup, usageError, write } from './common'

const log = createLogger('PSF')

const ACTIONS = ['create', 'metadata', 'scorecard', 'modifymetadata', 'ledger', 'forensic', 'manifest', 'extract'] as const

type PsfOptions = {
  create?: boolean
  input?: string
  metadata?: boolean
  scorecard?: boolean
  revision?: string
  coursepath?: string
  modifymetadata?: string
  ledger?: boolean
  forensic?: boolean
  manifest?: boolean
  extract?: boolean
  source: string
  destination?: string
  name?: string
  course?: string
  section?: string
  semester?: string
  assignment?: string
  group?: string
  force?: boolean
  allowNoConfig?: boolean
  disableVersionCheck?: boolean
  debug?: boolean
}

export function buildPsfCommand(): Command {
  return createProgram('psf', 'Create and inspect PSF submission archives')
    .argument('[values...]', 'new value for --modifymetadata')
    .option('-c, --create', 'pack the source directory into a new archive')
    .option('-i, --input <archive>', 'archive to operate on')
    .option('-m, --metadata', 'print the metadata')
    .option('-R, --scorecard', 'print the scorecard')
    .option('-r, --revision <n>', 'show the scorecard as of revision n')
    .option('-P, --coursepath <path>', 'colon-separated course definition files or directories')
    .option('--modifymetadata <field>', 'set a metadata field to the given value')
    .option('-L, --ledger', 'print the revision ledger')
    .option('-f, --forensic', 'print the forensic record')
    .option('-t, --manifest', 'list the payload files')
    .option('-x, --extract', 'extract the payload')
    .option('-s, --source <dir>', 'directory to pack', './')
    .option('-D, --destination <dir>', 'output directory for --create and --extract')
    .option('-n, --name <file>', 'archive file name for --create')
    .option('--course <name>', 'course identity field')
    .option('--section <name>', 'section identity field')
    .option('--semester <name>', 'semester identity field')
    .option('--assignment <name>', 'assignment identity field')
    .option('--group <name>', 'group identity field')
    .option('--force', 'overwrite an existing archive')
    .option('--allow-no-config', 'create without a psf.toml in the source directory')
    .option('--disable-version-check', 'skip the minimum tool version check')
}

export async function psfCli(argv: string[]): Promise<number> {
  return runCli(async () => {
    const program = buildPsfCommand().parse(argv, { from: 'user' })
    const values = program.opts<PsfOptions>()
    const positionals = program.args
    const config = setup(values.debug)

    const selected = ACTIONS.filter((action) => values[action] !== undefined && values[action] !== false)
    if (selected.length !== 1) {
      throw usageError(`specify exactly one of: ${ACTIONS.map((a) => `--${a}`).join(', ')}`)
    }
    const [action] = selected

    if (action === 'create') {
      const archive = await createArchive({
        source: values.source,
        destination: values.destination,
        name: values.name,
        overwrite: values.force,
        allowNoConfig: values.allowNoConfig,
        disableVersionCheck: values.disableVersionCheck,
        metadata: {
          course: values.course,
          section: values.section,
          semester: values.semester,
          assignment: values.assignment,
          group: values.group,
        },
      })
      write(archive.path)
      return 0
    }

    if (!values.input) {
      throw usageError('no input archive specified, use --input')
    }
    const input = values.input

    switch (action) {
      case 'metadata': {
        const archive = await openArchive(input)
        write(formatPairs(archive.metadata))
        return 0
      }

      case 'scorecard': {
        const archive = await openArchive(input)
        let upto: number | undefined
        if (values.revision !== undefined) {
          upto = Number(values.revision)
          if (!Number.isInteger(upto) || upto < 0 || upto >= archive.ledger.length) {
            throw new PsfError('NOT_FOUND', `archive '${input}' has no revision '${values.revision}'`)
          }
        }
        const scorecard = currentScorecard(archive.ledger, upto)
        if (scorecard.size === 0) {
          throw new PsfError('NOT_FOUND', `archive '${input}' has not been graded`)
        }
        const catalog = loadCourses(values.coursepath ?? config.coursePath)
        const course = requireCourse(catalog, readMetadataField(archive, 'course') ?? '')
        write(formatScorecard(scorecard, course, { feedback: currentFeedback(archive.ledger, upto) }))
        return 0
      }

      case 'modifymetadata': {
        const field = values.modifymetadata ?? ''
        if (positionals.length !== 1) {
          throw usageError('--modifymetadata takes a field name and exactly one value')
        }
        const archive = modifyMetadata(await openArchive(input), field, positionals[0])
        await saveArchive(archive)
        log.info(`set '${field}' on '${input}' (revision ${archive.ledger.length - 1})`)
        return 0
      }

      case 'ledger': {
        const archive = await openArchive(input)
        write(formatLedger(archive.ledger))
        return 0
      }

      case 'forensic': {
        const archive = await openArchive(input)
        if (!archive.forensic) {
          throw new PsfError('NOT_FOUND', `archive '${input}' carries no forensic data`)
        }
        const { flags, ...fields } = archive.forensic
        write(formatPairs({ ...fields, flags: flags.join(',') }))
        return 0
      }

      case 'manifest': {
        for (const file of await listPayload(input)) write(file)
        return 0
      }

      case 'extract': {
        const destination = values.destination ?? path.basename(input, ARCHIVE_EXTENSION)
        const written = await extractPayload(input, destination)
        log.info(`extracted ${written.length} files to '${destination}'`)
        return 0
      }
    }
  })
}

if (require.main === module) {
  psfCli(process.argv.slice(2))
    .then((code) => { process.exitCode = code })
    .catch((err) => { console.error(err); process.exitCode = 1 })
}
