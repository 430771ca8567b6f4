/**
 * Common types for all logger implementations
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error'

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  meta?: Record<string, unknown>
  component?: string
  error?: {
    name: string
    message: string
    code?: string
    stack?: string
  }
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void
  info(message: string, meta?: Record<string, unknown>): void
  warn(message: string, meta?: Record<string, unknown>, error?: Error): void
  error(message: string, meta?: Record<string, unknown>, error?: Error): void
}

export interface LoggerConfig {
  level: LogLevel
  format: 'json' | 'compact'
  includeStackTrace: boolean
  redactFields: string[]
}
