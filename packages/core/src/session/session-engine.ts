/**
 * Session lifecycle engine
 *
 * Owns one portal session: probes the network, authenticates on redirect,
 * keeps the session alive with heartbeats at the portal's cadence and logs out
 * on teardown. All session fields are written from the engine's own loop;
 * other callers only interact through `stop()` or the lifetime signal.
 */
import { CipherRegistry, ZERO_ALGO_ID } from '../cipher/index.js'
import { buildStateDocument, parseStateResponse, serializeStateDocument } from '../codec/index.js'
import { generateClientId, generateRunId } from '../identity/secure-id.js'
import { createSessionLogger, type Logger, type LoggerConfig } from '../logger/index.js'
import { MAX_TIMER_DELAY_MS, Ticker, type TickerPeriod } from '../scheduling/ticker.js'
import {
  createHttpTransport,
  defaultInterface,
  localHostname,
  resolveInterface,
  ZERO_MAC_ADDRESS,
  type HttpTransportOptions,
  type ProbeTransport,
} from '../transport/index.js'
import {
  CipherError,
  ConfigError,
  type PortalKeepError,
  Result,
  StateDocumentError,
  TransportError,
  UnexpectedStatusError,
  toError,
} from '../types/error.types.js'
import { PortalAuthenticator, sessionHeaders, type AuthenticatedSession } from './authenticator.js'
import { reportFailure } from './policy.js'
import { type AccountOptions, EMPTY_ENDPOINTS, type Session, type SessionState } from './types.js'

export const DEFAULT_PROBE_URL = 'http://connect.rom.miui.com/generate_204'
export const DEFAULT_INTERVAL_MS = 10_000
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000
export const DEFAULT_LOGOUT_TIMEOUT_MS = 5_000
export const DEFAULT_HEARTBEAT_INTERVAL_S = 60

export interface SessionEngineOptions {
  account: AccountOptions
  probeUrl?: string
  proxy?: string
  requestTimeout?: number
  /** Bound on each logout request, in milliseconds */
  logoutTimeout?: number
  /** Heartbeat interval (seconds) used when the portal advertises none at login */
  defaultHeartbeatInterval?: number
  ciphers?: CipherRegistry
  logger?: Logger
  /** Settings for the per-session logger; ignored when `logger` is given */
  loggerConfig?: Partial<LoggerConfig>
  transportFactory?: (options: HttpTransportOptions) => ProbeTransport
  now?: () => Date
}

export type ProbeOutcome = 'online' | 'redirected'

type LoopEvent = 'cancel' | 'poll' | 'heartbeat'

/**
 * Wait for the first of cancellation, a poll tick or a heartbeat tick.
 * Every listener added here is removed before the promise settles.
 */
function nextLoopEvent(signal: AbortSignal, poll: Ticker, heartbeat: Ticker): Promise<LoopEvent> {
  if (signal.aborted) return Promise.resolve<LoopEvent>('cancel')
  if (poll.hasTick) return Promise.resolve<LoopEvent>('poll')
  if (heartbeat.hasTick) return Promise.resolve<LoopEvent>('heartbeat')

  return new Promise<LoopEvent>(resolve => {
    const unsubscribers: Array<() => void> = []
    const settle = (event: LoopEvent) => {
      for (const unsubscribe of unsubscribers) unsubscribe()
      resolve(event)
    }
    const onAbort = () => settle('cancel')
    signal.addEventListener('abort', onAbort, { once: true })
    unsubscribers.push(
      () => signal.removeEventListener('abort', onAbort),
      poll.subscribe(() => settle('poll')),
      heartbeat.subscribe(() => settle('heartbeat'))
    )
  })
}

/**
 * Apply default/"never" rules to the configured intervals
 */
export function normalizeIntervals(
  checkInterval = DEFAULT_INTERVAL_MS,
  retryInterval = DEFAULT_INTERVAL_MS
): { pollIntervalMs: number; retryIntervalMs: number } {
  const pollIntervalMs = checkInterval > 0 ? checkInterval : DEFAULT_INTERVAL_MS
  let retryIntervalMs = retryInterval
  if (retryInterval === 0) retryIntervalMs = DEFAULT_INTERVAL_MS
  if (retryInterval < 0) retryIntervalMs = MAX_TIMER_DELAY_MS
  return { pollIntervalMs, retryIntervalMs }
}

const isRedirect = (status: number) => status >= 300 && status < 400

function asPortalError(error: unknown): PortalKeepError {
  if (error instanceof TransportError || error instanceof CipherError) return error
  return new TransportError(toError(error).message, { cause: error })
}

export class SessionEngine {
  readonly runId: string
  readonly pollIntervalMs: number
  readonly retryIntervalMs: number

  private readonly session: Session
  private readonly heartbeat = new Ticker()
  private readonly lifetime = new AbortController()
  private readonly authenticator: PortalAuthenticator
  private readonly clock: () => Date
  private pollTicker: Ticker | undefined
  private started = false
  private loggedOut = false

  private constructor(
    private readonly options: Required<
      Pick<SessionEngineOptions, 'probeUrl' | 'logoutTimeout' | 'defaultHeartbeatInterval'>
    >,
    private readonly transport: ProbeTransport,
    private readonly logger: Logger,
    account: AccountOptions,
    identity: { hostname: string; macAddress: string },
    ciphers: CipherRegistry,
    runId: string,
    now: () => Date
  ) {
    this.runId = runId
    this.clock = now
    const intervals = normalizeIntervals(account.checkInterval, account.retryInterval)
    this.pollIntervalMs = intervals.pollIntervalMs
    this.retryIntervalMs = intervals.retryIntervalMs

    this.session = {
      state: 'unauthenticated',
      clientId: generateClientId(),
      ticket: '',
      userIp: '',
      acIp: '',
      domain: '',
      area: '',
      schoolId: '',
      hostname: identity.hostname,
      macAddress: identity.macAddress,
      algoId: ZERO_ALGO_ID,
      endpoints: { ...EMPTY_ENDPOINTS },
      cipher: undefined,
    }

    this.authenticator = new PortalAuthenticator({
      transport,
      ciphers,
      credentials: { username: account.username, password: account.password },
      logger,
      redirectUrl: options.probeUrl,
      now,
    })
  }

  /**
   * Validate the account and build the transport
   */
  static create(options: SessionEngineOptions): Result<SessionEngine, ConfigError> {
    const { account } = options
    if (!account.username || !account.password) {
      return Result.error(new ConfigError('username or password is empty'))
    }

    const runId = generateRunId()
    const logger =
      options.logger ??
      createSessionLogger({
        runId,
        username: account.username,
        bindInterface: account.bindInterface,
        config: options.loggerConfig,
      })

    const factory = options.transportFactory ?? createHttpTransport
    let transport: ProbeTransport
    let macAddress: string
    try {
      macAddress =
        account.macAddress ??
        (account.bindInterface
          ? resolveInterface(account.bindInterface).mac
          : (defaultInterface()?.mac ?? ZERO_MAC_ADDRESS))
      transport = factory({
        bindInterface: account.bindInterface,
        proxy: options.proxy,
        requestTimeout: options.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT_MS,
      })
    } catch (error) {
      const cause = toError(error)
      const configError =
        cause instanceof ConfigError
          ? cause
          : new ConfigError(`failed to create transport: ${cause.message}`, { cause })
      reportFailure(logger, 'create', configError)
      return Result.error(configError)
    }

    const engine = new SessionEngine(
      {
        probeUrl: options.probeUrl ?? DEFAULT_PROBE_URL,
        logoutTimeout: options.logoutTimeout ?? DEFAULT_LOGOUT_TIMEOUT_MS,
        defaultHeartbeatInterval: options.defaultHeartbeatInterval ?? DEFAULT_HEARTBEAT_INTERVAL_S,
      },
      transport,
      logger,
      account,
      { hostname: account.hostname ?? localHostname(), macAddress },
      options.ciphers ?? new CipherRegistry(),
      runId,
      options.now ?? (() => new Date())
    )
    return Result.ok(engine)
  }

  get state(): SessionState {
    return this.session.state
  }

  /** Read-only view of the session record */
  get snapshot(): Readonly<Session> {
    return this.session
  }

  get heartbeatPeriod(): TickerPeriod {
    return this.heartbeat.state
  }

  get pollPeriod(): TickerPeriod | undefined {
    return this.pollTicker?.state
  }

  get signal(): AbortSignal {
    return this.lifetime.signal
  }

  /**
   * Cancel the session; `start()` returns after logging out
   */
  stop(): void {
    this.lifetime.abort()
  }

  /**
   * Release the heartbeat timer and transport of an engine that will never be started
   */
  async dispose(): Promise<void> {
    if (this.started) return
    this.started = true
    this.heartbeat.stop()
    await this.closeTransport()
  }

  /**
   * Run until cancelled. Always logs out exactly once and stops both timers.
   */
  async start(signal?: AbortSignal): Promise<void> {
    if (this.started) {
      this.logger.warn('client already started')
      return
    }
    this.started = true

    const onAbort = () => this.stop()
    if (signal?.aborted) {
      this.stop()
    } else {
      signal?.addEventListener('abort', onAbort, { once: true })
    }

    this.logger.info('client start')
    const poll = new Ticker({ kind: 'armed', intervalMs: this.pollIntervalMs })
    this.pollTicker = poll

    try {
      await this.probe()

      for (;;) {
        const event = await nextLoopEvent(this.lifetime.signal, poll, this.heartbeat)

        if (event === 'cancel') {
          this.logger.info('client context cancel')
          break
        }

        if (event === 'poll') {
          poll.consume()
          await this.probe()
        } else {
          this.heartbeat.consume()
          const result = await this.sendHeartbeat()
          if (result.ok) {
            this.logger.info('send heartbeat', { nextInSeconds: result.value })
          } else {
            reportFailure(this.logger, 'sendHeartbeat', result.error)
          }
        }
      }
    } finally {
      signal?.removeEventListener('abort', onAbort)
      await this.logout()
      this.heartbeat.stop()
      poll.stop()
      await this.closeTransport()
    }
  }

  /**
   * Probe the network; a redirect means the portal wants us to authenticate
   */
  async checkNetwork(): Promise<Result<ProbeOutcome, TransportError | UnexpectedStatusError>> {
    let status: number
    let location: string | undefined
    try {
      const response = await this.transport.get(this.options.probeUrl)
      status = response.status
      location = response.headers.location
    } catch (error) {
      return Result.error(
        error instanceof TransportError ? error : new TransportError(toError(error).message)
      )
    }

    if (status === 204) {
      return Result.ok('online')
    }

    if (isRedirect(status)) {
      // The session is known stale: no heartbeats until authentication succeeds again
      this.heartbeat.disable()
      this.session.state = 'unauthenticated'
      this.logger.info('auth required')
      await this.handleRedirect(location ?? '')
      return Result.ok('redirected')
    }

    return Result.error(new UnexpectedStatusError(status))
  }

  /**
   * Authenticate against the redirect target. Failures are logged and contained.
   */
  async handleRedirect(location: string): Promise<Result<void, never>> {
    const result = await this.authenticate(location)
    if (result.ok) {
      this.logger.info('auth finished')
    } else {
      reportFailure(this.logger, 'authenticate', result.error)
    }
    return Result.ok(undefined)
  }

  async authenticate(location: string): Promise<Result<AuthenticatedSession, PortalKeepError>> {
    this.session.state = 'authenticating'
    const result = await this.authenticator.authenticate(this.session, location)

    if (!result.ok) {
      this.session.state = 'unauthenticated'
      return result
    }

    const auth = result.value
    this.session.userIp = auth.userIp
    this.session.acIp = auth.acIp
    this.session.domain = auth.domain
    this.session.area = auth.area
    this.session.schoolId = auth.schoolId
    this.session.ticket = auth.ticket
    this.session.algoId = auth.algoId
    this.session.cipher = auth.cipher
    this.session.endpoints = auth.endpoints
    this.session.state = 'authenticated'

    this.heartbeat.reset((auth.keepRetry ?? this.options.defaultHeartbeatInterval) * 1000)
    return result
  }

  /**
   * Send one heartbeat and re-arm the ticker with the interval the portal returns
   * @returns the new interval in seconds
   */
  async sendHeartbeat(): Promise<Result<number, PortalKeepError>> {
    const { cipher } = this.session
    if (!cipher || !this.session.endpoints.keepUrl) {
      return Result.error(new StateDocumentError('session is not authenticated'))
    }

    const doc = buildStateDocument(this.session, this.now())
    if (!doc.ok) return doc

    let plaintext: string
    try {
      const response = await this.transport.post(
        this.session.endpoints.keepUrl,
        cipher.seal(serializeStateDocument(doc.value)),
        { headers: sessionHeaders(this.session.clientId, this.session.algoId) }
      )
      if (response.status !== 200) {
        return Result.error(new UnexpectedStatusError(response.status))
      }
      plaintext = cipher.open(response.body)
    } catch (error) {
      return Result.error(asPortalError(error))
    }

    const parsed = parseStateResponse(plaintext)
    if (!parsed.ok) return parsed

    this.heartbeat.reset(parsed.value.interval * 1000)
    return Result.ok(parsed.value.interval)
  }

  /**
   * Best-effort logout, attempted once. Failures never propagate.
   */
  async logout(): Promise<void> {
    if (this.loggedOut) return
    this.loggedOut = true

    const timeoutMs = this.options.logoutTimeout
    try {
      const probe = await this.transport.get(this.options.probeUrl, { timeoutMs })
      const { cipher } = this.session
      if (probe.status === 204 && cipher && this.session.endpoints.termUrl) {
        const doc = buildStateDocument(this.session, this.now())
        if (!doc.ok) {
          reportFailure(this.logger, 'logout', doc.error)
        } else {
          await this.transport.post(
            this.session.endpoints.termUrl,
            cipher.seal(serializeStateDocument(doc.value)),
            { headers: sessionHeaders(this.session.clientId, this.session.algoId), timeoutMs }
          )
          this.logger.info('log out request sent')
        }
      }
    } catch (error) {
      reportFailure(this.logger, 'logout', asPortalError(error))
    } finally {
      this.session.state = 'loggedOut'
    }
  }

  private now(): Date {
    return this.clock()
  }

  private async probe(): Promise<void> {
    const result = await this.checkNetwork()
    const poll = this.pollTicker

    if (result.ok) {
      // Leave the retry cadence once the probe succeeds again
      if (poll?.state.kind === 'armed' && poll.state.intervalMs !== this.pollIntervalMs) {
        poll.reset(this.pollIntervalMs)
      }
      return
    }

    reportFailure(this.logger, 'checkNetwork', result.error)
    if (poll?.state.kind === 'armed' && poll.state.intervalMs !== this.retryIntervalMs) {
      poll.reset(this.retryIntervalMs)
    }
  }

  private async closeTransport(): Promise<void> {
    try {
      await this.transport.close()
    } catch (error) {
      this.logger.debug('transport close failed', { reason: toError(error).message })
    }
  }
}
