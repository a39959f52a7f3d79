#!/usr/bin/env node
import 'dotenv/config'
import { Command } from 'commander'
import { EXPORT_COLUMNS, exportGrades, recordCells } from '../services/exportService'
import { loadCourses } from '../utils/courseDefinition'
import { formatTable } from '../utils/tableFormat'
import { createProgram, runCli, setup, usageError, write } from './common'

type ExportOptions = {
  moodle?: boolean
  table?: boolean
  coursepath?: string
  debug?: boolean
}

export function buildExportCommand(): Command {
  return createProgram('psf-export', 'Export the grades of the archives below the given paths (default: .)')
    .argument('[paths...]', 'archives or directories to export')
    .option('-m, --moodle', 'Moodle-compatible CSV')
    .option('-t, --table', 'plain text table')
    .option('-P, --coursepath <path>', 'colon-separated course definition files or directories')
}

export async function exportCli(argv: string[]): Promise<number> {
  return runCli(async () => {
    const program = buildExportCommand().parse(argv, { from: 'user' })
    const options = program.opts<ExportOptions>()
    const config = setup(options.debug)

    if (Boolean(options.moodle) === Boolean(options.table)) {
      throw usageError('specify exactly one of: --moodle, --table')
    }

    const catalog = loadCourses(options.coursepath ?? config.coursePath)
    const records = await exportGrades(program.args.length ? program.args : ['.'], catalog)
    write(formatTable(EXPORT_COLUMNS, records.map(recordCells), options.moodle ? 'csv' : 'plain'))
    return 0
  })
}

if (require.main === module) {
  exportCli(process.argv.slice(2))
    .then((code) => { process.exitCode = code })
    .catch((err) => { console.error(err); process.exitCode = 1 })
}
