/**
 * Session record owned by the session engine
 */
import type { Cipher } from '../cipher/index.js'
import type { SessionIdentity } from '../codec/index.js'

export type SessionState = 'unauthenticated' | 'authenticating' | 'authenticated' | 'loggedOut'

/**
 * Portal endpoints discovered during authentication; empty until then
 */
export interface PortalEndpoints {
  indexUrl: string
  ticketUrl: string
  authUrl: string
  keepUrl: string
  termUrl: string
  redirectUrl: string
}

export interface Session extends SessionIdentity {
  state: SessionState
  /** ZERO_ALGO_ID until the portal hands out a real algorithm id */
  algoId: string
  endpoints: PortalEndpoints
  /** Set once authentication has succeeded at least once */
  cipher: Cipher | undefined
}

/**
 * Account settings a session is created from
 */
export interface AccountOptions {
  username: string
  password: string
  bindInterface?: string
  /** Poll interval in milliseconds; non-positive means default */
  checkInterval?: number
  /** Retry interval in milliseconds; 0 means default, negative means never */
  retryInterval?: number
  hostname?: string
  macAddress?: string
}

export const EMPTY_ENDPOINTS: PortalEndpoints = {
  indexUrl: '',
  ticketUrl: '',
  authUrl: '',
  keepUrl: '',
  termUrl: '',
  redirectUrl: '',
}
