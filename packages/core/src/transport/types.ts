/**
 * HTTP transport contract used by the session engine
 */

export interface HttpResponse {
  status: number
  /** Lower-cased header names */
  headers: Record<string, string>
  body: string
}

export interface RequestOptions {
  headers?: Record<string, string>
  /** Bound on the whole request, in milliseconds */
  timeoutMs?: number
}

/**
 * Request executor that never follows redirects, so 3xx responses reach the caller
 */
export interface ProbeTransport {
  get(url: string, options?: RequestOptions): Promise<HttpResponse>
  post(url: string, body: string, options?: RequestOptions): Promise<HttpResponse>
  close(): Promise<void>
}

export interface HttpTransportOptions {
  /** Network interface whose IPv4 address outgoing connections bind to */
  bindInterface?: string
  /** HTTP proxy URL */
  proxy?: string
  /** Default per-request timeout in milliseconds */
  requestTimeout: number
  userAgent?: string
}
