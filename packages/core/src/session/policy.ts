/**
 * How the engine contains failures of each operation
 *
 * - fatal: returned to the caller; only construction uses it
 * - logAndContinue: logged, state unchanged, the loop carries on
 * - logAndRetryNextTick: logged, the operation runs again on its next tick
 * - suppress: logged at debug level only
 */
import type { Logger } from '../logger/index.js'
import type { PortalKeepError } from '../types/error.types.js'

export type ErrorPolicy = 'fatal' | 'logAndContinue' | 'logAndRetryNextTick' | 'suppress'

export type EngineOperation = 'create' | 'checkNetwork' | 'authenticate' | 'sendHeartbeat' | 'logout'

export const ERROR_POLICY = {
  create: 'fatal',
  checkNetwork: 'logAndRetryNextTick',
  authenticate: 'logAndContinue',
  sendHeartbeat: 'logAndRetryNextTick',
  logout: 'suppress',
} as const satisfies Record<EngineOperation, ErrorPolicy>

const MESSAGES: Record<EngineOperation, string> = {
  create: 'session creation failed',
  checkNetwork: 'network check failed',
  authenticate: 'auth failed',
  sendHeartbeat: 'send heartbeat error',
  logout: 'logout failed',
}

/**
 * Log `error` as the policy for `operation` prescribes
 */
export function reportFailure(logger: Logger, operation: EngineOperation, error: PortalKeepError): void {
  const meta = { code: error.code }
  switch (ERROR_POLICY[operation]) {
    case 'fatal':
      logger.error(MESSAGES[operation], meta, error)
      break
    case 'logAndContinue':
    case 'logAndRetryNextTick':
      logger.warn(MESSAGES[operation], meta, error)
      break
    case 'suppress':
      logger.debug(`${MESSAGES[operation]}: ${error.message}`, meta)
      break
  }
}
