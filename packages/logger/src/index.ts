/**
 * @mangaku/logger
 *
 * Structured logging for the scraper workspace.
 *
 * - JSON lines in production, coloured single lines in development
 * - ISO 8601 timestamps
 * - Levels: debug, info, warn, error, fatal
 * - Child loggers inherit service, component path and context
 * - Output goes through a sink, so callers (and tests) can capture entries
 *
 * Environment variables (read when a logger is created without options):
 * - LOG_LEVEL: minimum level. Default: info
 * - LOG_FORMAT: json | pretty. Default: json in production, pretty otherwise
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'
export type LogFormat = 'json' | 'pretty'

export interface LogContext {
  [key: string]: unknown
}

export interface LogEntry {
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

/** Receives every entry that passes the level filter. */
export type LogSink = (entry: LogEntry) => void

export interface LoggerOptions {
  level?: LogLevel
  format?: LogFormat
  sink?: LogSink
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
}

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m', // Green
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
  fatal: '\x1b[35m', // Magenta
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BRIGHT = '\x1b[1m'

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value)
}

export function resolveLogLevel(raw: string | undefined): LogLevel {
  const level = raw?.toLowerCase()
  return isLogLevel(level) ? level : 'info'
}

export function resolveLogFormat(raw: string | undefined, nodeEnv: string | undefined): LogFormat {
  const format = raw?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  return nodeEnv === 'production' ? 'json' : 'pretty'
}

function formatError(error: unknown): LogEntry['error'] | undefined {
  if (!error) return undefined

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

export function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

export function formatPretty(entry: LogEntry): string {
  const color = LOG_COLORS[entry.level]
  const levelStr = entry.level.toUpperCase().padEnd(5)

  const componentPath = entry.component
    ? `${entry.service}:${entry.component}`
    : entry.service

  const { timestamp, level: _level, service: _service, component: _component, message, error, ...meta } = entry

  const metaStr =
    Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''

  const errorStr = error ? `\n  ${DIM}${error.stack || error.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${levelStr}${RESET} ${DIM}[${componentPath}]${RESET} ${message}${metaStr}${errorStr}`
}

/**
 * Writes every level to stderr. For processes whose stdout carries data.
 */
export function stderrSink(format: LogFormat): LogSink {
  return entry => {
    console.error(format === 'json' ? formatJson(entry) : formatPretty(entry))
  }
}

/**
 * Default sink: formats the entry and writes it to the console method
 * matching its level.
 */
export function consoleSink(format: LogFormat): LogSink {
  return entry => {
    const formatted = format === 'json' ? formatJson(entry) : formatPretty(entry)

    switch (entry.level) {
      case 'debug':
        console.debug(formatted)
        break
      case 'info':
        console.info(formatted)
        break
      case 'warn':
        console.warn(formatted)
        break
      case 'error':
      case 'fatal':
        console.error(formatted)
        break
    }
  }
}

export interface ILogger {
  readonly level: LogLevel
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * Create a child logger. A string extends the component path
   * (`fetch` under `engine` becomes `engine:fetch`); an object only adds context.
   */
  child(componentOrContext: string | LogContext, defaultContext?: LogContext): ILogger
}

interface ResolvedOptions {
  level: LogLevel
  sink: LogSink
}

export class Logger implements ILogger {
  private readonly service: string
  private readonly component?: string
  private readonly defaultContext: LogContext
  private readonly options: ResolvedOptions

  constructor(
    service: string,
    options: LoggerOptions = {},
    component?: string,
    defaultContext: LogContext = {}
  ) {
    this.service = service
    this.component = component
    this.defaultContext = defaultContext
    this.options = {
      level: options.level ?? resolveLogLevel(process.env.LOG_LEVEL),
      sink: options.sink ?? consoleSink(options.format ?? resolveLogFormat(process.env.LOG_FORMAT, process.env.NODE_ENV)),
    }
  }

  get level(): LogLevel {
    return this.options.level
  }

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.options.level]) return

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

    const errorData = formatError(error)
    if (errorData) {
      entry.error = errorData
    }

    this.options.sink(entry)
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
      return new Logger(this.service, this.options, this.component, {
        ...this.defaultContext,
        ...componentOrContext,
      })
    }
    const newComponent = this.component
      ? `${this.component}:${componentOrContext}`
      : componentOrContext
    return new Logger(this.service, this.options, newComponent, {
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
 * import { createLogger } from '@mangaku/logger'
 *
 * const logger = createLogger('harvester')
 * logger.info('SCRAPER_READY', { baseUrl: 'https://mangaaku.com' })
 *
 * const fetchLogger = logger.child('fetch')
 * fetchLogger.warn('FETCH_RETRY', { attempt: 2, statusCode: 503 })
 * ```
 */
export function createLogger(service: string, options: LoggerOptions = {}): ILogger {
  return new Logger(service, options)
}

/**
 * Logger that records entries in memory instead of printing them.
 * Returned entries are live: they grow as the logger is used.
 */
export function createMemoryLogger(
  service: string,
  level: LogLevel = 'debug'
): { logger: ILogger; entries: LogEntry[] } {
  const entries: LogEntry[] = []
  const logger = new Logger(service, { level, sink: entry => entries.push(entry) })
  return { logger, entries }
}
