/**
 * Structured Logging for the wallet ledger
 *
 * Provides consistent logging with levels, timestamps, and context.
 * Entries can also be kept in an in-memory ring for inspection.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  context?: Record<string, unknown>
  error?: {
    name: string
    message: string
    stack?: string
  }
}

export interface LoggerConfig {
  minLevel: LogLevel
  enableConsole: boolean
  enableStorage: boolean
  maxStoredLogs: number
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
}

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: 'info',
  enableConsole: true,
  enableStorage: false,
  maxStoredLogs: 1000
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS
}

class Logger {
  private config: LoggerConfig
  private logs: LogEntry[] = []

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config }
  }

  /**
   * Configure the logger
   */
  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.minLevel]
  }

  private formatContext(context?: Record<string, unknown>): string {
    if (!context || Object.keys(context).length === 0) {
      return ''
    }
    return ' ' + JSON.stringify(context)
  }

  private createEntry(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack
      }
    }

    return entry
  }

  private logToConsole(entry: LogEntry): void {
    if (!this.config.enableConsole) return

    const prefix = `[${entry.timestamp.slice(11, 19)}]`
    const contextStr = this.formatContext(entry.context)

    switch (entry.level) {
      case 'debug':
        console.debug(`${prefix} DEBUG: ${entry.message}${contextStr}`)
        break
      case 'info':
        console.info(`${prefix} INFO: ${entry.message}${contextStr}`)
        break
      case 'warn':
        console.warn(`${prefix} WARN: ${entry.message}${contextStr}`)
        if (entry.error) {
          console.warn(entry.error.stack || entry.error.message)
        }
        break
      case 'error':
        console.error(`${prefix} ERROR: ${entry.message}${contextStr}`)
        if (entry.error) {
          console.error(entry.error.stack || entry.error.message)
        }
        break
    }
  }

  private storeEntry(entry: LogEntry): void {
    if (!this.config.enableStorage) return

    this.logs.push(entry)

    if (this.logs.length > this.config.maxStoredLogs) {
      this.logs = this.logs.slice(-this.config.maxStoredLogs)
    }
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (!this.shouldLog(level)) return

    const entry = this.createEntry(level, message, context, error)
    this.logToConsole(entry)
    this.storeEntry(entry)
  }

  /**
   * Debug level log, dropped unless the minimum level is `debug`
   */
  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context)
  }

  /**
   * Info level log
   */
  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context)
  }

  /**
   * Warning level log, with an optional error whose stack is printed
   */
  warn(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.log('warn', message, context, error)
  }

  /**
   * Error level log. Non-Error values are kept as `errorValue` in the context.
   */
  error(message: string, error?: Error | unknown, context?: Record<string, unknown>): void {
    const errorObj = error instanceof Error ? error : undefined
    const errorContext = error && !(error instanceof Error)
      ? { ...context, errorValue: String(error) }
      : context

    this.log('error', message, errorContext, errorObj)
  }

  /**
   * Get stored logs, optionally filtered by level
   */
  getLogs(level?: LogLevel): LogEntry[] {
    if (!level) return [...this.logs]
    return this.logs.filter(log => log.level === level)
  }

  /**
   * Empty the in-memory ring
   */
  clearLogs(): void {
    this.logs = []
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): ChildLogger {
    return new ChildLogger(this, context)
  }
}

/**
 * Child logger that includes parent context
 */
class ChildLogger {
  private parent: Logger
  private baseContext: Record<string, unknown>

  constructor(parent: Logger, baseContext: Record<string, unknown>) {
    this.parent = parent
    this.baseContext = baseContext
  }

  private mergeContext(context?: Record<string, unknown>): Record<string, unknown> {
    return { ...this.baseContext, ...context }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.parent.debug(message, this.mergeContext(context))
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.parent.info(message, this.mergeContext(context))
  }

  warn(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.parent.warn(message, this.mergeContext(context), error)
  }

  error(message: string, error?: Error | unknown, context?: Record<string, unknown>): void {
    this.parent.error(message, error, this.mergeContext(context))
  }
}

function defaultMinLevel(env: Record<string, string | undefined>): LogLevel {
  const configured = env.LEDGER_LOG_LEVEL?.toLowerCase()
  if (isLogLevel(configured)) return configured
  // Quiet under the test runner unless asked otherwise
  return env.VITEST ? 'warn' : 'info'
}

// Create and export singleton instance
export const logger = new Logger({
  minLevel: defaultMinLevel(process.env),
  enableConsole: true,
  enableStorage: false
})

// Export class for custom instances
export { Logger, ChildLogger }

// Module loggers
export const dbLogger = logger.child({ module: 'db' })
export const walletLogger = logger.child({ module: 'wallet' })
export const keyLogger = logger.child({ module: 'keys' })
export const linkLogger = logger.child({ module: 'linker' })
export const syncLogger = logger.child({ module: 'sync' })
export const cryptoLogger = logger.child({ module: 'crypto' })
