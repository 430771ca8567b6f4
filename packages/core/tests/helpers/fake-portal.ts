import type { HttpResponse, Logger, ProbeTransport, RequestOptions } from '../../src/index.js'
import { TransportError, ZERO_ALGO_ID } from '../../src/index.js'

export const PROBE_URL = 'http://probe.test/generate_204'
export const PORTAL_ORIGIN = 'http://portal.test'
export const INDEX_URL = `${PORTAL_ORIGIN}/index?wlanuserip=10.0.0.5&wlanacip=10.0.0.1`
export const TICKET_URL = `${PORTAL_ORIGIN}/ticket`
export const AUTH_URL = `${PORTAL_ORIGIN}/auth`
export const KEEP_URL = `${PORTAL_ORIGIN}/keep`
export const TERM_URL = `${PORTAL_ORIGIN}/term`

const DECLARATION = '<?xml version="1.0" encoding="utf-8"?>'

export interface RecordedRequest {
  method: 'GET' | 'POST'
  url: string
  body?: string
  headers: Record<string, string>
  timeoutMs?: number
}

export type RouteHandler = (request: RecordedRequest) => HttpResponse | Promise<HttpResponse>

export const reply = (status: number, body = '', headers: Record<string, string> = {}): HttpResponse => ({
  status,
  headers,
  body,
})

/**
 * In-process transport answering from registered routes
 */
export class FakeTransport implements ProbeTransport {
  readonly requests: RecordedRequest[] = []
  closed = false
  private readonly routes = new Map<string, RouteHandler>()

  on(method: 'GET' | 'POST', url: string, handler: RouteHandler): this {
    this.routes.set(`${method} ${url}`, handler)
    return this
  }

  requestsTo(url: string): RecordedRequest[] {
    return this.requests.filter(request => request.url === url)
  }

  get(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    return this.dispatch({ method: 'GET', url, headers: options.headers ?? {}, timeoutMs: options.timeoutMs })
  }

  post(url: string, body: string, options: RequestOptions = {}): Promise<HttpResponse> {
    return this.dispatch({
      method: 'POST',
      url,
      body,
      headers: options.headers ?? {},
      timeoutMs: options.timeoutMs,
    })
  }

  async close(): Promise<void> {
    this.closed = true
  }

  private async dispatch(request: RecordedRequest): Promise<HttpResponse> {
    this.requests.push(request)
    const handler = this.routes.get(`${request.method} ${request.url}`)
    if (!handler) {
      throw new TransportError(`${request.method} ${request.url} failed: connection refused`)
    }
    return handler(request)
  }
}

export function portalConfigXml(fields: Record<string, string> = {}): string {
  const elements = {
    'ticket-url': TICKET_URL,
    'auth-url': AUTH_URL,
    domain: 'campus',
    area: 'north',
    'school-id': '42',
    ...fields,
  }
  return `${DECLARATION}<config>${toXml(elements)}</config>`
}

export function responseXml(fields: Record<string, string>): string {
  return `${DECLARATION}<response>${toXml(fields)}</response>`
}

function toXml(fields: Record<string, string>): string {
  return Object.entries(fields)
    .map(([name, value]) => `<${name}>${value}</${name}>`)
    .join('')
}

export interface CaptivePortalOptions {
  algoId?: string
  ticket?: string
  /** Heartbeat interval advertised at login; `null` leaves it out */
  keepRetry?: string | null
  /** Interval returned by each heartbeat */
  heartbeatInterval?: string
}

/**
 * Portal that redirects the probe until a login succeeds, with passthrough payloads
 */
export function createCaptivePortal(options: CaptivePortalOptions = {}): {
  transport: FakeTransport
  state: { online: boolean }
} {
  const state = { online: false }
  const transport = new FakeTransport()
  const { algoId = ZERO_ALGO_ID, ticket = 'T-1', keepRetry = '30', heartbeatInterval = '20' } = options

  transport
    .on('GET', PROBE_URL, () => (state.online ? reply(204) : reply(302, '', { location: INDEX_URL })))
    .on('GET', INDEX_URL, () => reply(200, portalConfigXml()))
    .on('POST', TICKET_URL, () => reply(200, responseXml({ ticket, 'algo-id': algoId })))
    .on('POST', AUTH_URL, () => {
      state.online = true
      const fields: Record<string, string> = { 'keep-url': KEEP_URL, 'term-url': TERM_URL }
      if (keepRetry !== null) fields['keep-retry'] = keepRetry
      return reply(200, responseXml(fields))
    })
    .on('POST', KEEP_URL, () => reply(200, responseXml({ interval: heartbeatInterval })))
    .on('POST', TERM_URL, () => {
      state.online = false
      return reply(200, responseXml({ result: 'ok' }))
    })

  return { transport, state }
}

export interface LogRecord {
  level: 'debug' | 'info' | 'warn' | 'error'
  message: string
  meta?: Record<string, unknown>
  error?: Error
}

/**
 * Logger that records entries instead of printing them
 */
export function createRecordingLogger(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = []
  const logger: Logger = {
    debug: (message, meta) => records.push({ level: 'debug', message, meta }),
    info: (message, meta) => records.push({ level: 'info', message, meta }),
    warn: (message, meta, error) => records.push({ level: 'warn', message, meta, error }),
    error: (message, meta, error) => records.push({ level: 'error', message, meta, error }),
  }
  return { logger, records }
}

/**
 * Let pending promise chains run; `setImmediate` stays real in these tests
 */
export const flush = () => new Promise<void>(resolve => setImmediate(resolve))
