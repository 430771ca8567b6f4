export {
  SessionEngine,
  normalizeIntervals,
  DEFAULT_PROBE_URL,
  DEFAULT_INTERVAL_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_LOGOUT_TIMEOUT_MS,
  DEFAULT_HEARTBEAT_INTERVAL_S,
  type ProbeOutcome,
  type SessionEngineOptions,
} from './session-engine.js'
export {
  PortalAuthenticator,
  sessionHeaders,
  type AuthenticatedSession,
  type AuthenticatorDeps,
} from './authenticator.js'
export { ERROR_POLICY, reportFailure, type EngineOperation, type ErrorPolicy } from './policy.js'
export type { AccountOptions, PortalEndpoints, Session, SessionState } from './types.js'
