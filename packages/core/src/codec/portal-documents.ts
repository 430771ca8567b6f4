/**
 * Documents exchanged during the portal handshake
 */
import { z } from 'zod'
import type { MalformedResponseError, Result } from '../types/error.types.js'
import { IntervalSchema } from './state-document.js'
import { readDocument } from './xml.js'

/**
 * Portal configuration served from the index URL
 */
export interface PortalConfig {
  ticketUrl: string
  authUrl: string
  keepUrl?: string
  termUrl?: string
  domain: string
  area: string
  schoolId: string
}

export interface TicketResponse {
  ticket: string
  algoId: string
}

export interface AuthResponse {
  keepUrl?: string
  termUrl?: string
  /** Heartbeat interval in seconds advertised at login */
  keepRetry?: number
}

const url = z.string().trim().url()
const optionalUrl = z
  .string()
  .trim()
  .optional()
  .transform(value => (value ? value : undefined))
  .pipe(url.optional())

const PortalConfigSchema = z
  .object({
    'ticket-url': url,
    'auth-url': url,
    'keep-url': optionalUrl,
    'term-url': optionalUrl,
    domain: z.string().default(''),
    area: z.string().default(''),
    'school-id': z.string().default(''),
  })
  .passthrough()
  .transform(
    (raw): PortalConfig => ({
      ticketUrl: raw['ticket-url'],
      authUrl: raw['auth-url'],
      ...(raw['keep-url'] && { keepUrl: raw['keep-url'] }),
      ...(raw['term-url'] && { termUrl: raw['term-url'] }),
      domain: raw.domain,
      area: raw.area,
      schoolId: raw['school-id'],
    })
  )

const TicketResponseSchema = z
  .object({
    ticket: z.string().min(1),
    'algo-id': z.string().min(1),
  })
  .passthrough()
  .transform((raw): TicketResponse => ({ ticket: raw.ticket, algoId: raw['algo-id'] }))

const AuthResponseSchema = z
  .object({
    'keep-url': optionalUrl,
    'term-url': optionalUrl,
    'keep-retry': IntervalSchema.optional(),
  })
  .passthrough()
  .transform(
    (raw): AuthResponse => ({
      ...(raw['keep-url'] && { keepUrl: raw['keep-url'] }),
      ...(raw['term-url'] && { termUrl: raw['term-url'] }),
      ...(raw['keep-retry'] !== undefined && { keepRetry: raw['keep-retry'] }),
    })
  )

export function parsePortalConfig(xml: string): Result<PortalConfig, MalformedResponseError> {
  return readDocument(xml, 'config', PortalConfigSchema)
}

export function parseTicketResponse(xml: string): Result<TicketResponse, MalformedResponseError> {
  return readDocument(xml, 'response', TicketResponseSchema)
}

export function parseAuthResponse(xml: string): Result<AuthResponse, MalformedResponseError> {
  return readDocument(xml, 'response', AuthResponseSchema)
}
