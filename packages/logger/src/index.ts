/**
 * @dredger/logger
 *
 * Structured logging for the dredger workspace.
 *
 * - JSON output for production and log shippers
 * - Colored single-line output for terminals
 * - Child loggers with inherited component path and context
 * - Credential-like metadata keys are redacted before output
 *
 * Environment variables:
 * - LOG_LEVEL: debug, info, warn, error, fatal or silent. Default: info (warn under NODE_ENV=test)
 * - LOG_FORMAT: json or pretty. Default: json in production, pretty otherwise
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

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
    code?: string
    stack?: string
  }
  [key: string]: unknown
}

/** Receives every entry that passes the level check. */
export type LogSink = (entry: LogEntry, formatted: string) => void

const LOG_LEVELS: Record<LogLevel | 'silent', number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
  silent: 5,
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

const REDACTED = '[REDACTED]'

/** Metadata keys whose values never reach the output. Matched case-insensitively. */
const SENSITIVE_KEYS = ['token', 'apikey', 'api_key', 'authorization', 'password', 'secret']

let levelOverride: LogLevel | 'silent' | null = null
let sinkOverride: LogSink | null = null

function isLevel(value: string | undefined): value is LogLevel | 'silent' {
  return value !== undefined && value in LOG_LEVELS
}

function getLogLevel(): LogLevel | 'silent' {
  if (levelOverride) return levelOverride

  const level = process.env.LOG_LEVEL?.toLowerCase()
  if (isLevel(level)) {
    return level
  }
  return process.env.NODE_ENV === 'test' ? 'warn' : 'info'
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

/**
 * Force a minimum level regardless of LOG_LEVEL. Pass null to go back to the environment.
 */
export function setLogLevel(level: LogLevel | 'silent' | null): void {
  levelOverride = level
}

/**
 * Route formatted entries somewhere other than the console. Pass null to restore console output.
 */
export function setLogSink(sink: LogSink | null): void {
  sinkOverride = sink
}

function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase()
  return SENSITIVE_KEYS.some((needle) => lower.includes(needle))
}

function isPlainObject(value: unknown): value is LogContext {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date)
}

export function redact(meta: LogContext): LogContext {
  const out: LogContext = {}
  for (const [key, value] of Object.entries(meta)) {
    if (isSensitiveKey(key)) {
      out[key] = REDACTED
    } else if (isPlainObject(value)) {
      out[key] = redact(value)
    } else {
      out[key] = value
    }
  }
  return out
}

function formatError(error: unknown): LogEntry['error'] | undefined {
  if (!error) return undefined

  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined
    return {
      name: error.name,
      message: error.message,
      ...(code ? { code } : {}),
      stack: error.stack,
    }
  }

  return {
    name: 'UnknownError',
    message: String(error),
  }
}

function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
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

function output(entry: LogEntry): void {
  const formatted = getLogFormat() === 'json' ? formatJson(entry) : formatPretty(entry)

  if (sinkOverride) {
    sinkOverride(entry, formatted)
    return
  }

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

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * Create a child logger
   * @param componentOrContext - Component name appended to the path, or extra context
   * @param defaultContext - Context merged into every entry (only used when first arg is a string)
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

    const errorData = error ? formatError(error) : undefined

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...redact({ ...this.defaultContext, ...meta }),
    }

    if (this.component) {
      entry.component = this.component
    }

    if (errorData) {
      entry.error = errorData
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
    const newComponent = this.component ? `${this.component}:${componentOrContext}` : componentOrContext
    return new Logger(this.service, newComponent, {
      ...this.defaultContext,
      ...defaultContext,
    })
  }
}

/**
 * Create a logger for a service
 *
 * @example
 * ```ts
 * const logger = createLogger('dredger')
 * logger.info('Run started', { sites: 10 })
 *
 * const fetchLogger = logger.child('fetch')
 * fetchLogger.warn('Retrying', { attempt: 2 })
 * ```
 */
export function createLogger(service: string): ILogger {
  return new Logger(service)
}
