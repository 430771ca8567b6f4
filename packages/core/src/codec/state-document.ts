/**
 * State document: the client identity/session record exchanged with the portal
 */
import { z } from 'zod'
import { Result, StateDocumentError, type MalformedResponseError } from '../types/error.types.js'
import { buildDocument, readDocument } from './xml.js'

/**
 * Session fields a state document is built from
 */
export interface SessionIdentity {
  clientId: string
  ticket: string
  userIp: string
  acIp: string
  domain: string
  area: string
  schoolId: string
  hostname: string
  macAddress: string
}

export interface StateDocument extends SessionIdentity {
  /** Freshness marker (`YYYY-MM-DD HH:mm:ss`, local time) */
  localTime: string
}

export interface Credentials {
  username: string
  password: string
}

/**
 * Decoded heartbeat/state response
 */
export interface StateResponse {
  /** Seconds until the next heartbeat is expected */
  interval: number
  result?: string
}

const ELEMENTS: Record<keyof StateDocument, string> = {
  clientId: 'client-id',
  ticket: 'ticket',
  localTime: 'local-time',
  hostname: 'host-name',
  userIp: 'ipv4',
  acIp: 'gwip',
  macAddress: 'mac-address',
  domain: 'domain',
  area: 'area',
  schoolId: 'school-id',
}

const FIELD_ORDER: Array<keyof StateDocument> = [
  'clientId',
  'ticket',
  'localTime',
  'hostname',
  'userIp',
  'acIp',
  'macAddress',
  'domain',
  'area',
  'schoolId',
]

const text = z.string().default('')

const StateDocumentSchema = z
  .object({
    'client-id': z.string().min(1),
    ticket: text,
    'local-time': z.string().min(1),
    'host-name': text,
    ipv4: text,
    gwip: text,
    'mac-address': text,
    domain: text,
    area: text,
    'school-id': text,
  })
  .passthrough()
  .transform(
    (raw): StateDocument => ({
      clientId: raw['client-id'],
      ticket: raw.ticket,
      localTime: raw['local-time'],
      hostname: raw['host-name'],
      userIp: raw.ipv4,
      acIp: raw.gwip,
      macAddress: raw['mac-address'],
      domain: raw.domain,
      area: raw.area,
      schoolId: raw['school-id'],
    })
  )

/** Heartbeat intervals are positive whole seconds */
export const IntervalSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, 'interval is not an integer')
  .transform(Number)
  .refine(seconds => seconds > 0, 'interval must be positive')

const StateResponseSchema = z
  .object({
    interval: IntervalSchema,
    result: z.string().optional(),
  })
  .passthrough()
  .transform(
    (raw): StateResponse => ({
      interval: raw.interval,
      ...(raw.result !== undefined && { result: raw.result }),
    })
  )

const pad = (value: number) => String(value).padStart(2, '0')

/**
 * Format a timestamp as `YYYY-MM-DD HH:mm:ss` in local time
 */
export function formatLocalTime(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  )
}

/**
 * Build the canonical state document for a session
 */
export function buildStateDocument(
  session: SessionIdentity,
  now: Date = new Date()
): Result<StateDocument, StateDocumentError> {
  if (!session.clientId) {
    return Result.error(new StateDocumentError('session has no client id'))
  }

  return Result.ok({
    clientId: session.clientId,
    ticket: session.ticket,
    userIp: session.userIp,
    acIp: session.acIp,
    domain: session.domain,
    area: session.area,
    schoolId: session.schoolId,
    hostname: session.hostname,
    macAddress: session.macAddress,
    localTime: formatLocalTime(now),
  })
}

function toElements(doc: StateDocument): Record<string, string> {
  const elements: Record<string, string> = {}
  for (const field of FIELD_ORDER) {
    elements[ELEMENTS[field]] = doc[field]
  }
  return elements
}

export function serializeStateDocument(doc: StateDocument): string {
  return buildDocument('request', toElements(doc))
}

/**
 * State document extended with the user's credentials, sent to the auth endpoint
 */
export function serializeAuthRequest(doc: StateDocument, credentials: Credentials): string {
  return buildDocument('request', {
    ...toElements(doc),
    'user-id': credentials.username,
    passwd: credentials.password,
  })
}

export function parseStateDocument(xml: string): Result<StateDocument, MalformedResponseError> {
  return readDocument(xml, 'request', StateDocumentSchema)
}

export function parseStateResponse(xml: string): Result<StateResponse, MalformedResponseError> {
  return readDocument(xml, 'response', StateResponseSchema)
}
