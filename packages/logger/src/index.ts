/**
 * @cratedigger/logger
 *
 * Structured logging shared by the crawler and its CLI.
 *
 * - JSON lines in production, colored single-line output elsewhere
 * - Levels: debug, info, warn, error, fatal
 * - Child loggers carry a component path and default context
 * - Everything goes to stderr; stdout belongs to command output
 *   (search results, exports) so it can be piped
 *
 * Environment variables:
 * - LOG_LEVEL: Minimum level (debug, info, warn, error, fatal). Default: info
 * - LOG_FORMAT: json | pretty. Default: json when NODE_ENV=production, else pretty
 * - LOG_FILE: also append every entry as a JSON line to this file
 *
 * `setLogLevel()` overrides LOG_LEVEL for the rest of the process (used by
 * `--verbose`).
 */

import { appendFileSync, mkdirSync } from 'node:fs'
import { dirname } from 'node:path'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export interface LogContext {
  [key: string]: unknown
}

interface LogEntry {
  timestamp: string
  level: LogLevel
  service: string
  component?: string
  message: string
  error?: {
    name: string
    message: string
    stack?: string
  }
  [key: string]: unknown
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
}

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BRIGHT = '\x1b[1m'

let levelOverride: LogLevel | null = null

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value)
}

/**
 * Force a minimum level regardless of LOG_LEVEL. Pass null to clear.
 */
export function setLogLevel(level: LogLevel | null): void {
  levelOverride = level
}

export function getLogLevel(): LogLevel {
  if (levelOverride) {
    return levelOverride
  }
  const level = process.env.LOG_LEVEL?.toLowerCase()
  return isLogLevel(level) ? level : 'info'
}

function getLogFormat(): 'json' | 'pretty' {
  const format = process.env.LOG_FORMAT?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[getLogLevel()]
}

function formatError(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    }
  }

  return {
    name: 'UnknownError',
    message: String(error),
  }
}

function formatPretty(entry: LogEntry): string {
  const color = LOG_COLORS[entry.level]
  const levelStr = entry.level.toUpperCase().padEnd(5)
  const componentPath = entry.component ? `${entry.service}:${entry.component}` : entry.service

  const { timestamp, level: _level, service: _service, component: _component, message, error, ...meta } = entry

  const metaStr = Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''
  const errorStr = error ? `\n  ${DIM}${error.stack || error.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${levelStr}${RESET} ${DIM}[${componentPath}]${RESET} ${message}${metaStr}${errorStr}`
}

// LOG_FILE paths that failed once; not retried for the rest of the process
const failedLogFiles = new Set<string>()

function appendToLogFile(path: string, entry: LogEntry): void {
  if (failedLogFiles.has(path)) return
  try {
    mkdirSync(dirname(path), { recursive: true })
    appendFileSync(path, `${JSON.stringify(entry)}\n`, 'utf-8')
  } catch (error) {
    failedLogFiles.add(path)
    console.error(`Cannot write log file ${path}: ${error instanceof Error ? error.message : String(error)}`)
  }
}

function output(entry: LogEntry): void {
  console.error(getLogFormat() === 'json' ? JSON.stringify(entry) : formatPretty(entry))

  const logFile = process.env.LOG_FILE?.trim()
  if (logFile) {
    appendToLogFile(logFile, entry)
  }
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * Create a child logger. A string extends the component path
   * (`crawler:fetch`), an object only adds default context.
   */
  child(componentOrContext: string | LogContext, defaultContext?: LogContext): ILogger
}

export class Logger implements ILogger {
  private readonly service: string
  private readonly component?: string
  private readonly defaultContext: LogContext

  constructor(service: string, component?: string, defaultContext: LogContext = {}) {
    this.service = service
    this.component = component
    this.defaultContext = defaultContext
  }

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (!shouldLog(level)) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...this.defaultContext,
      ...meta,
    }

    if (this.component) {
      entry.component = this.component
    }

    if (error !== undefined) {
      entry.error = formatError(error)
    }

    output(entry)
  }

  debug(message: string, meta?: LogContext): void {
    this.log('debug', message, meta)
  }

  info(message: string, meta?: LogContext): void {
    this.log('info', message, meta)
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this.log('warn', message, meta, error)
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this.log('error', message, meta, error)
  }

  fatal(message: string, meta?: LogContext, error?: unknown): void {
    this.log('fatal', message, meta, error)
  }

  child(componentOrContext: string | LogContext, defaultContext: LogContext = {}): ILogger {
    if (typeof componentOrContext === 'object') {
      return new Logger(this.service, this.component, {
        ...this.defaultContext,
        ...componentOrContext,
      })
    }

    const component = this.component ? `${this.component}:${componentOrContext}` : componentOrContext
    return new Logger(this.service, component, {
      ...this.defaultContext,
      ...defaultContext,
    })
  }
}

/**
 * Create a logger for a service.
 *
 * @example
 * ```ts
 * const logger = createLogger('crawler')
 * logger.info('Run started', { genre: 'rock' })
 *
 * const fetchLogger = logger.child('fetch')
 * fetchLogger.warn('Retrying', { attempt: 2 })
 * ```
 */
export function createLogger(service: string): ILogger {
  return new Logger(service)
}

/**
 * Logger that drops everything. Handy as a default in tests and library code.
 */
export const silentLogger: ILogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  fatal: () => {},
  child: () => silentLogger,
}
