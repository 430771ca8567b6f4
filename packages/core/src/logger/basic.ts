/**
 * Lightweight console logger for portalkeep
 * Structured entries, level filtering and key-based redaction
 */

import type { LogEntry, Logger, LoggerConfig, LogLevelName } from './types.js'
import { LogLevel } from './types.js'

const LEVEL_NAMES: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
}

const isLogLevelName = (value: string): value is LogLevelName => Object.hasOwn(LEVEL_NAMES, value)

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined
  const key = value.toLowerCase()
  return isLogLevelName(key) ? LEVEL_NAMES[key] : undefined
}

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

/**
 * Create a console-backed logger
 */
export function createLogger(config: LoggerConfig, component?: string): Logger {
  const shouldLog = (logLevel: LogLevel): boolean => logLevel >= config.level

  const redactSensitiveData = (obj: unknown): unknown => {
    if (Array.isArray(obj)) {
      return obj.map(redactSensitiveData)
    }

    if (!isPlainObject(obj)) {
      return obj
    }

    const result: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(obj)) {
      const lowerKey = key.toLowerCase()
      if (config.redactFields.some(field => lowerKey.includes(field))) {
        result[key] = '[REDACTED]'
      } else if (typeof value === 'object') {
        result[key] = redactSensitiveData(value)
      } else {
        result[key] = value
      }
    }
    return result
  }

  const createLogEntry = (
    level: LogLevel,
    message: string,
    meta?: Record<string, unknown>,
    error?: Error
  ): LogEntry => {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    }

    if (component) {
      entry.component = component
    }

    if (meta) {
      const redactedMeta = redactSensitiveData(meta)
      if (isPlainObject(redactedMeta)) {
        entry.meta = redactedMeta
      }
    }

    if (error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined
      entry.error = {
        name: error.name,
        message: error.message,
        ...(code && { code }),
        ...(config.includeStackTrace && error.stack && { stack: error.stack }),
      }
    }

    return entry
  }

  const formatLogEntry = (entry: LogEntry): string => {
    if (config.format === 'json') {
      return JSON.stringify({ ...entry, level: LogLevel[entry.level] })
    }

    // Compact format for terminals
    const levelName = LogLevel[entry.level]
    const timestamp = entry.timestamp.split('T')[1]?.split('.')[0] || ''
    const comp = entry.component ? ` [${entry.component}]` : ''
    const meta = entry.meta ? ` ${JSON.stringify(entry.meta)}` : ''
    const err = entry.error ? `: ${entry.error.message}` : ''

    return `${timestamp} ${levelName}${comp} ${entry.message}${err}${meta}`
  }

  const writeLog = (entry: LogEntry): void => {
    const formatted = formatLogEntry(entry)

    switch (entry.level) {
      case LogLevel.DEBUG:
        console.debug(formatted)
        break
      case LogLevel.INFO:
        console.info(formatted)
        break
      case LogLevel.WARN:
        console.warn(formatted)
        break
      case LogLevel.ERROR:
        console.error(formatted)
        break
    }
  }

  const log = (level: LogLevel, message: string, meta?: Record<string, unknown>, error?: Error) => {
    if (!shouldLog(level)) return
    writeLog(createLogEntry(level, message, meta, error))
  }

  return {
    debug: (message, meta) => log(LogLevel.DEBUG, message, meta),
    info: (message, meta) => log(LogLevel.INFO, message, meta),
    warn: (message, meta, error) => log(LogLevel.WARN, message, meta, error),
    error: (message, meta, error) => log(LogLevel.ERROR, message, meta, error),
  }
}

/**
 * Default logger configuration
 */
export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: LogLevel.INFO,
  format: 'compact',
  includeStackTrace: true,
  redactFields: ['password', 'passwd', 'token', 'secret', 'key', 'authorization', 'ticket'],
}

/**
 * Create default logger with common settings
 * NODE_ENV=production switches to JSON lines, LOG_LEVEL overrides the level
 */
export function createDefaultLogger(component?: string, overrides: Partial<LoggerConfig> = {}): Logger {
  const isProduction = process.env.NODE_ENV === 'production'

  const config: LoggerConfig = {
    ...DEFAULT_LOGGER_CONFIG,
    level: parseLogLevel(process.env.LOG_LEVEL) ?? (isProduction ? LogLevel.INFO : LogLevel.DEBUG),
    format: isProduction ? 'json' : 'compact',
    includeStackTrace: !isProduction,
    ...overrides,
  }

  return createLogger(config, component)
}
