/**
 * Portal authentication handshake
 *
 * index (portal config) -> ticket (algorithm id) -> cipher negotiation -> auth.
 * The authenticator never mutates the session: it returns what the engine
 * should apply on success.
 */
import type { Cipher, CipherRegistry } from '../cipher/index.js'
import { ZERO_ALGO_ID } from '../cipher/index.js'
import {
  type Credentials,
  type SessionIdentity,
  buildStateDocument,
  parseAuthResponse,
  parsePortalConfig,
  parseTicketResponse,
  serializeAuthRequest,
  serializeStateDocument,
} from '../codec/index.js'
import type { Logger } from '../logger/index.js'
import type { ProbeTransport } from '../transport/index.js'
import {
  AuthenticationError,
  CipherError,
  Result,
  UnexpectedStatusError,
  toError,
} from '../types/error.types.js'
import type { PortalEndpoints } from './types.js'

export interface AuthenticatorDeps {
  transport: ProbeTransport
  ciphers: CipherRegistry
  credentials: Credentials
  logger: Logger
  /** URL the portal should send the user back to */
  redirectUrl: string
  now?: () => Date
}

/**
 * Everything the engine applies to its session after a successful handshake
 */
export interface AuthenticatedSession {
  userIp: string
  acIp: string
  domain: string
  area: string
  schoolId: string
  ticket: string
  algoId: string
  cipher: Cipher
  endpoints: PortalEndpoints
  /** Heartbeat interval in seconds advertised by the portal, if any */
  keepRetry?: number
}

type Step = 'redirect' | 'index' | 'ticket' | 'cipher' | 'auth'

function failed(step: Step, error: Error): Result<never, AuthenticationError> {
  return Result.error(
    new AuthenticationError(`${step} step failed: ${error.message}`, { step, cause: error })
  )
}

export function sessionHeaders(clientId: string, algoId: string): Record<string, string> {
  return {
    'Client-ID': clientId,
    'Algo-ID': algoId,
  }
}

export class PortalAuthenticator {
  private readonly now: () => Date

  constructor(private readonly deps: AuthenticatorDeps) {
    this.now = deps.now ?? (() => new Date())
  }

  async authenticate(
    identity: SessionIdentity,
    location: string
  ): Promise<Result<AuthenticatedSession, AuthenticationError>> {
    const { logger } = this.deps

    let indexUrl: URL
    try {
      indexUrl = new URL(location)
    } catch {
      return failed('redirect', new Error(`invalid redirect location "${location}"`))
    }

    const userIp = indexUrl.searchParams.get('wlanuserip') ?? identity.userIp
    const acIp = indexUrl.searchParams.get('wlanacip') ?? identity.acIp

    // Portal configuration
    const index = await this.fetchText('index', () => this.deps.transport.get(indexUrl.toString()))
    if (!index.ok) return index
    const portal = parsePortalConfig(index.value)
    if (!portal.ok) return failed('index', portal.error)
    logger.debug('Portal configuration fetched', { endpoint: portal.value.ticketUrl })

    const base: SessionIdentity = {
      ...identity,
      userIp,
      acIp,
      domain: portal.value.domain,
      area: portal.value.area,
      schoolId: portal.value.schoolId,
      ticket: '',
    }

    // Ticket and algorithm id, exchanged before any cipher is negotiated
    const zeroCipher = this.deps.ciphers.create(ZERO_ALGO_ID, { clientId: identity.clientId, ticket: '' })
    if (!zeroCipher.ok) return failed('ticket', zeroCipher.error)
    const ticketDoc = buildStateDocument(base, this.now())
    if (!ticketDoc.ok) return failed('ticket', ticketDoc.error)
    const ticketBody = await this.exchange(
      'ticket',
      portal.value.ticketUrl,
      serializeStateDocument(ticketDoc.value),
      zeroCipher.value,
      identity.clientId
    )
    if (!ticketBody.ok) return ticketBody
    const ticket = parseTicketResponse(ticketBody.value)
    if (!ticket.ok) return failed('ticket', ticket.error)

    const cipher = this.deps.ciphers.create(ticket.value.algoId, {
      clientId: identity.clientId,
      ticket: ticket.value.ticket,
    })
    if (!cipher.ok) return failed('cipher', cipher.error)
    logger.debug('Cipher negotiated', { algoId: ticket.value.algoId })

    // Login
    const authDoc = buildStateDocument({ ...base, ticket: ticket.value.ticket }, this.now())
    if (!authDoc.ok) return failed('auth', authDoc.error)
    const authBody = await this.exchange(
      'auth',
      portal.value.authUrl,
      serializeAuthRequest(authDoc.value, this.deps.credentials),
      cipher.value,
      identity.clientId
    )
    if (!authBody.ok) return authBody
    const auth = parseAuthResponse(authBody.value)
    if (!auth.ok) return failed('auth', auth.error)

    const keepUrl = auth.value.keepUrl ?? portal.value.keepUrl
    const termUrl = auth.value.termUrl ?? portal.value.termUrl
    if (!keepUrl || !termUrl) {
      return failed('auth', new Error('portal did not provide keep-alive and terminate URLs'))
    }

    return Result.ok({
      userIp,
      acIp,
      domain: base.domain,
      area: base.area,
      schoolId: base.schoolId,
      ticket: ticket.value.ticket,
      algoId: ticket.value.algoId,
      cipher: cipher.value,
      endpoints: {
        indexUrl: indexUrl.toString(),
        ticketUrl: portal.value.ticketUrl,
        authUrl: portal.value.authUrl,
        keepUrl,
        termUrl,
        redirectUrl: this.deps.redirectUrl,
      },
      ...(auth.value.keepRetry !== undefined && { keepRetry: auth.value.keepRetry }),
    })
  }

  /**
   * Seal `plaintext`, POST it and open the 200 response body
   */
  private async exchange(
    step: Step,
    url: string,
    plaintext: string,
    cipher: Cipher,
    clientId: string
  ): Promise<Result<string, AuthenticationError>> {
    let sealed: string
    try {
      sealed = cipher.seal(plaintext)
    } catch (error) {
      return failed(step, new CipherError(toError(error).message))
    }

    const body = await this.fetchText(step, () =>
      this.deps.transport.post(url, sealed, { headers: sessionHeaders(clientId, cipher.algoId) })
    )
    if (!body.ok) return body

    try {
      return Result.ok(cipher.open(body.value))
    } catch (error) {
      return failed(step, error instanceof CipherError ? error : new CipherError(toError(error).message))
    }
  }

  private async fetchText(
    step: Step,
    send: () => Promise<{ status: number; body: string }>
  ): Promise<Result<string, AuthenticationError>> {
    try {
      const response = await send()
      if (response.status !== 200) {
        return failed(step, new UnexpectedStatusError(response.status))
      }
      return Result.ok(response.body)
    } catch (error) {
      return failed(step, toError(error))
    }
  }
}
