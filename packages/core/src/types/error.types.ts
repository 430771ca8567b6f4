/**
 * Error types and Result pattern for portalkeep
 */

/**
 * Base error class for all portalkeep errors
 */
export class PortalKeepError extends Error {
  public readonly code: string
  public readonly details?: unknown

  constructor(message: string, code: string, details?: unknown) {
    super(message)
    this.name = 'PortalKeepError'
    this.code = code
    this.details = details
  }
}

/**
 * Construction-time errors: empty credentials, unusable bind interface, bad proxy
 */
export class ConfigError extends PortalKeepError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', details)
    this.name = 'ConfigError'
  }
}

/**
 * Network failures while talking to the probe endpoint or the portal
 */
export class TransportError extends PortalKeepError {
  constructor(message: string, details?: unknown) {
    super(message, 'TRANSPORT_ERROR', details)
    this.name = 'TransportError'
  }
}

/**
 * The probe endpoint answered with neither 204 nor a redirect
 */
export class UnexpectedStatusError extends PortalKeepError {
  public readonly status: number

  constructor(status: number, details?: unknown) {
    super(`unexpected status code: ${status}`, 'UNEXPECTED_STATUS', details)
    this.name = 'UnexpectedStatusError'
    this.status = status
  }
}

/**
 * A portal document could not be parsed or lacks required fields
 */
export class MalformedResponseError extends PortalKeepError {
  constructor(message: string, details?: unknown) {
    super(message, 'MALFORMED_RESPONSE', details)
    this.name = 'MalformedResponseError'
  }
}

/**
 * The session lacks what a state document needs (e.g. no client id)
 */
export class StateDocumentError extends PortalKeepError {
  constructor(message: string, details?: unknown) {
    super(message, 'STATE_DOCUMENT_ERROR', details)
    this.name = 'StateDocumentError'
  }
}

export class AuthenticationError extends PortalKeepError {
  constructor(message: string, details?: unknown) {
    super(message, 'AUTH_ERROR', details)
    this.name = 'AuthenticationError'
  }
}

export class CipherError extends PortalKeepError {
  constructor(message: string, details?: unknown) {
    super(message, 'CIPHER_ERROR', details)
    this.name = 'CipherError'
  }
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}

/**
 * Result type for operations that can fail
 */
export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

/**
 * Utility functions for Result type
 */
export const Result = {
  /**
   * Create a successful result
   */
  ok: <T>(value: T): Result<T, never> => ({ ok: true, value }),

  /**
   * Create an error result
   */
  error: <E = Error>(error: E): Result<never, E> => ({ ok: false, error }),

  /**
   * Map over a successful result
   */
  map: <T, U, E = Error>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> => {
    return result.ok ? { ok: true, value: fn(result.value) } : result
  },

  /**
   * Chain results together
   */
  flatMap: <T, U, E = Error>(
    result: Result<T, E>,
    fn: (value: T) => Result<U, E>
  ): Result<U, E> => {
    return result.ok ? fn(result.value) : result
  },

  /**
   * Get value or throw error
   */
  unwrap: <T, E>(result: Result<T, E>): T => {
    if (result.ok) {
      return result.value
    }
    throw result.error
  },

  /**
   * Get value or return default
   */
  unwrapOr: <T, E>(result: Result<T, E>, defaultValue: T): T => {
    return result.ok ? result.value : defaultValue
  },
}
