import { createDefaultLogger } from './basic.js'
import type { Logger, LoggerConfig } from './types.js'

/** Display name used in log lines when no bind interface is configured */
export const BIND_INTERFACE_SENTINEL = 'sys_default'

export interface SessionLoggerOptions {
  runId: string
  username: string
  bindInterface?: string
  config?: Partial<LoggerConfig>
}

/**
 * Per-session logger: every line carries `<runId> user:<name> bind_device:<iface>`
 */
export function createSessionLogger(options: SessionLoggerOptions): Logger {
  const device = options.bindInterface || BIND_INTERFACE_SENTINEL
  return createDefaultLogger(
    `${options.runId} user:${options.username} bind_device:${device}`,
    options.config
  )
}
