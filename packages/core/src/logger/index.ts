/**
 * Logger exports
 *
 * Usage:
 * - import { createLogger, createDefaultLogger } from '@portalkeep/core/logger'
 * - import type { Logger, LoggerConfig } from '@portalkeep/core/logger'
 */

export type { Logger, LoggerConfig, LogEntry, LogLevelName } from './types.js'
export { LogLevel } from './types.js'
export {
  createLogger,
  createDefaultLogger,
  parseLogLevel,
  DEFAULT_LOGGER_CONFIG,
} from './basic.js'
export { createSessionLogger, BIND_INTERFACE_SENTINEL, type SessionLoggerOptions } from './session.js'
