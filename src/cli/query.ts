#!/usr/bin/env node
import 'dotenv/config'
import { Command, Option } from 'commander'
import { runQuery } from '../services/queryService'
import { loadCourses } from '../utils/courseDefinition'
import { OUTPUT_FORMATS, OutputFormat, formatTable } from '../utils/tableFormat'
import { createProgram, runCli, setup, usageError, write } from './common'

type QueryOptions = {
  query?: string
  format: string
  coursepath?: string
  debug?: boolean
}

const isOutputFormat = (value: string): value is OutputFormat => (OUTPUT_FORMATS as readonly string[]).includes(value)

export function buildQueryCommand(): Command {
  return createProgram('psf-query', 'Run a SQL query over the archives below the given paths (default: .)')
    .argument('[paths...]', 'archives or directories to search')
    .option('-q, --query <sql>', 'query against the table psf, for example: SELECT course FROM psf')
    .addOption(new Option('-F, --format <format>', 'output format').choices(OUTPUT_FORMATS).default('plain'))
    .option('-P, --coursepath <path>', 'colon-separated course definition files or directories')
}

export async function queryCli(argv: string[]): Promise<number> {
  return runCli(async () => {
    const program = buildQueryCommand().parse(argv, { from: 'user' })
    const options = program.opts<QueryOptions>()
    const config = setup(options.debug)

    if (!options.query) {
      throw usageError('specify a query with --query, for example: SELECT course FROM psf')
    }
    if (!isOutputFormat(options.format)) {
      throw usageError(`unknown output format '${options.format}', expected one of ${OUTPUT_FORMATS.join(', ')}`)
    }

    const catalog = loadCourses(options.coursepath ?? config.coursePath)
    const inputs = program.args.length ? program.args : ['.']
    const result = await runQuery(inputs, options.query, catalog)
    write(formatTable(result.columns, result.rows, options.format))
    return 0
  })
}

if (require.main === module) {
  queryCli(process.argv.slice(2))
    .then((code) => { process.exitCode = code })
    .catch((err) => { console.error(err); process.exitCode = 1 })
}
