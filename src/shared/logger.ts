import { appendFileSync, mkdirSync } from 'node:fs'
import { dirname } from 'node:path'

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export interface LoggerSettings {
  level: LogLevel
  /** Log file path; null disables logging */
  file: string | null
}

export interface Logger {
  trace: (message: string) => void
  debug: (message: string) => void
  info: (message: string) => void
  warn: (message: string) => void
  error: (message: string) => void
}

// The dashboard owns the terminal, so log lines only ever go to a file
let settings: LoggerSettings = { level: 'info', file: null }

export const configureLogger = (next: LoggerSettings): void => {
  settings = next
  if (next.file) {
    mkdirSync(dirname(next.file), { recursive: true })
  }
}

export const getLoggerSettings = (): LoggerSettings => settings

/**
 * Formats a log line.
 *
 * @example
 * formatLogLine('info', 'ledger', 'Loaded 3 transactions', new Date('2024-01-05T10:00:00Z'))
 * // => '[2024-01-05T10:00:00.000Z INFO ledger] Loaded 3 transactions'
 */
export const formatLogLine = (
  level: LogLevel,
  target: string,
  message: string,
  now: Date = new Date()
): string => `[${now.toISOString()} ${level.toUpperCase()} ${target}] ${message}`

export const isLevelEnabled = (level: LogLevel, threshold: LogLevel): boolean =>
  LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold)

const write = (level: LogLevel, target: string, message: string) => {
  const { file } = settings
  if (!file || !isLevelEnabled(level, settings.level)) return

  try {
    appendFileSync(file, `${formatLogLine(level, target, message)}\n`)
  } catch (err) {
    process.stderr.write(
      `Could not write to log file ${file}: ${err instanceof Error ? err.message : String(err)}\n`
    )
  }
}

/**
 * Creates a logger that tags every line with `target`.
 */
export const createLogger = (target: string): Logger => ({
  trace: (message) => write('trace', target, message),
  debug: (message) => write('debug', target, message),
  info: (message) => write('info', target, message),
  warn: (message) => write('warn', target, message),
  error: (message) => write('error', target, message),
})
