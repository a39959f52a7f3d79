// Diagnostics go to stderr so stdout only carries command output.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

let threshold: LogLevel = 'info'

export function setLogLevel(level: LogLevel) {
  threshold = level
}

const enabled = (level: LogLevel) => LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold)

export interface Logger {
  debug: (...args: unknown[]) => void
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`
  return {
    debug: (...args) => { if (enabled('debug')) console.error(prefix, ...args) },
    info: (...args) => { if (enabled('info')) console.error(prefix, ...args) },
    warn: (...args) => { if (enabled('warn')) console.warn(prefix, ...args) },
    error: (...args) => { if (enabled('error')) console.error(prefix, ...args) },
  }
}
