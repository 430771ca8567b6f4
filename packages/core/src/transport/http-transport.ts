/**
 * undici-backed transport bound to an interface or routed through a proxy
 */
import { Agent, type Dispatcher, ProxyAgent, request } from 'undici'
import { createDefaultLogger } from '../logger/index.js'
import { ConfigError, TransportError, toError } from '../types/error.types.js'
import { type InterfaceTable, resolveInterface } from './interfaces.js'
import type { HttpResponse, HttpTransportOptions, ProbeTransport, RequestOptions } from './types.js'

const logger = createDefaultLogger('http-transport')

export const DEFAULT_USER_AGENT = 'portalkeep/0.1'

type HeaderValue = string | string[] | undefined

function flattenHeaders(headers: Record<string, HeaderValue>): Record<string, string> {
  const result: Record<string, string> = {}
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue
    result[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value
  }
  return result
}

export class HttpTransport implements ProbeTransport {
  constructor(
    private readonly dispatcher: Dispatcher,
    private readonly options: Pick<HttpTransportOptions, 'requestTimeout' | 'userAgent'>
  ) {}

  get(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    return this.send('GET', url, undefined, options)
  }

  post(url: string, body: string, options: RequestOptions = {}): Promise<HttpResponse> {
    return this.send('POST', url, body, options)
  }

  async close(): Promise<void> {
    await this.dispatcher.close()
  }

  private async send(
    method: 'GET' | 'POST',
    url: string,
    body: string | undefined,
    options: RequestOptions
  ): Promise<HttpResponse> {
    const timeoutMs = options.timeoutMs ?? this.options.requestTimeout

    try {
      const response = await request(url, {
        method,
        body,
        dispatcher: this.dispatcher,
        headers: {
          'user-agent': this.options.userAgent ?? DEFAULT_USER_AGENT,
          ...(body !== undefined && { 'content-type': 'application/xml; charset=utf-8' }),
          ...options.headers,
        },
        signal: AbortSignal.timeout(timeoutMs),
      })

      return {
        status: response.statusCode,
        headers: flattenHeaders(response.headers),
        body: await response.body.text(),
      }
    } catch (error) {
      const cause = toError(error)
      logger.debug('Request failed', { method, url, reason: cause.message })
      throw new TransportError(`${method} ${url} failed: ${cause.message}`, { cause })
    }
  }
}

export type DispatcherPlan =
  | { kind: 'proxy'; options: ProxyAgent.Options }
  | { kind: 'direct'; options: Agent.Options }

/**
 * Work out which dispatcher the bind interface / proxy settings call for.
 * Through a proxy the source address applies to the connection to the proxy.
 * @throws ConfigError when the interface cannot be used or the proxy URL is invalid
 */
export function planDispatcher(options: HttpTransportOptions, table?: InterfaceTable): DispatcherPlan {
  const connect = options.bindInterface
    ? { localAddress: resolveInterface(options.bindInterface, table).address }
    : undefined

  if (options.proxy) {
    let uri: string
    try {
      uri = new URL(options.proxy).toString()
    } catch (error) {
      throw new ConfigError(`invalid proxy: ${options.proxy}`, { cause: toError(error) })
    }
    return { kind: 'proxy', options: { uri, ...(connect && { proxyTls: connect }) } }
  }

  return { kind: 'direct', options: connect ? { connect } : {} }
}

export function createDispatcher(options: HttpTransportOptions): Dispatcher {
  const plan = planDispatcher(options)
  return plan.kind === 'proxy' ? new ProxyAgent(plan.options) : new Agent(plan.options)
}

export function createHttpTransport(options: HttpTransportOptions): HttpTransport {
  return new HttpTransport(createDispatcher(options), options)
}
