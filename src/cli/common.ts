import { Command, CommanderError } from 'commander'
import { loadConfig, AppConfig } from '../config'
import { TOOL_VERSION } from '../constants'
import { PsfError, errorMessage, isPsfError } from '../utils/errors'
import { createLogger, setLogLevel } from '../utils/logger'

const log = createLogger('CLI')

export function write(text: string) {
  process.stdout.write(text.endsWith('\n') || text === '' ? text : `${text}\n`)
}

/** Apply environment config and the --debug flag */
export function setup(debug: boolean | undefined): AppConfig {
  const config = loadConfig()
  setLogLevel(debug ? 'debug' : config.logLevel)
  return config
}

export function usageError(message: string): PsfError {
  return new PsfError('MALFORMED_INPUT', message)
}

export function versionLine(tool: string): string {
  return `${tool} ${TOOL_VERSION}`
}

/**
 * Command with the options every tool shares. Parsing errors, --help and
 * --version throw a CommanderError instead of exiting the process.
 */
export function createProgram(tool: string, description: string): Command {
  return new Command(tool)
    .description(description)
    .version(versionLine(tool), '--version', 'print the version and exit')
    .option('-d, --debug', 'log debugging output to stderr')
    .exitOverride()
    .configureOutput({ outputError: (message) => log.error(message.trimEnd()) })
}

/**
 * Run a command body and turn every failure into a non-zero exit status.
 * Commander has already printed its own message (or the help text) when it
 * throws, so only its exit code is kept.
 */
export async function runCli(main: () => Promise<number>): Promise<number> {
  try {
    return await main()
  } catch (e) {
    if (e instanceof CommanderError) {
      return e.exitCode
    }
    if (isPsfError(e)) {
      log.error(`${e.code}: ${e.message}`)
    } else {
      log.error('unexpected failure:', errorMessage(e))
      log.debug(e)
    }
    return 1
  }
}
