#!/usr/bin/env node
import 'dotenv/config'
import fs from 'fs'
import { Command } from 'commander'
import { collectArchivePaths } from '../services/archiveStore'
import { reconcile } from '../services/reconciliationService'
import { loadCourses } from '../utils/courseDefinition'
import { GradeBatch, GradeRecordOptions, parseGradeRecords, readGradeRecords } from '../utils/gradeRecords'
import { createLogger } from '../utils/logger'
import { createProgram, runCli, setup, usageError, write } from './common'

const log = createLogger('Import')

type ImportOptions = {
  coursepath?: string
  input?: string
  schema?: string
  tsv?: boolean
  allowUnmatched?: boolean
  dryRun?: boolean
  note?: string
  debug?: boolean
}

export function buildImportCommand(): Command {
  return createProgram('psf-import', 'Import grade records (CSV or TSV) into the matching archives')
    .argument('[archives...]', 'archives or directories of archives to update')
    .option('-i, --input <file>', 'grade records to import (default: stdin)')
    .option('-s, --schema <columns>', 'comma-separated column names, for input without a header row')
    .option('-t, --tsv', 'input is tab-separated')
    .option('-P, --coursepath <path>', 'colon-separated course definition files or directories')
    .option('--allow-unmatched', 'skip records that match no archive')
    .option('-n, --dry-run', 'print the planned updates without writing')
    .option('--note <text>', 'note stored on every revision this run appends')
}

export async function importCli(argv: string[]): Promise<number> {
  return runCli(async () => {
    const program = buildImportCommand().parse(argv, { from: 'user' })
    const options = program.opts<ImportOptions>()
    const config = setup(options.debug)

    if (program.args.length === 0) {
      throw usageError('specify the archives (or directories of archives) to import into')
    }

    const recordOptions: GradeRecordOptions = {
      delimiter: options.tsv ? '\t' : ',',
      schema: options.schema?.split(',').map((s) => s.trim()),
    }

    let batch: GradeBatch
    if (options.input !== undefined) {
      batch = readGradeRecords(options.input, recordOptions)
    } else if (!process.stdin.isTTY) {
      batch = parseGradeRecords(fs.readFileSync(0, 'utf8'), recordOptions)
    } else {
      throw usageError('no input source, specify --input')
    }
    log.info(`loaded ${batch.rows.length} records from input`)

    const catalog = loadCourses(options.coursepath ?? config.coursePath)
    const archives = collectArchivePaths(program.args)

    const result = await reconcile(archives, batch, catalog, {
      allowUnmatched: options.allowUnmatched,
      dryRun: options.dryRun,
      note: options.note,
    })

    for (const issue of result.issues) {
      log.error(`${issue.code}: ${issue.message}`)
      for (const candidate of issue.candidates) log.error(`    candidate: ${candidate}`)
    }
    for (const failure of result.failures) {
      log.error(`${failure.target}: ${failure.error}`)
    }

    if (result.dryRun) {
      for (const update of result.planned) {
        write(`would update ${update.path}: ${JSON.stringify(update.contributions)}`)
      }
    } else {
      for (const update of result.applied) {
        write(`updated ${update.path}: revision ${update.sequence}`)
      }
    }

    return result.success ? 0 : 1
  })
}

if (require.main === module) {
  importCli(process.argv.slice(2))
    .then((code) => { process.exitCode = code })
    .catch((err) => { console.error(err); process.exitCode = 1 })
}
