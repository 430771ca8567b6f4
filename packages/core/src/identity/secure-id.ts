/**
 * Random identifiers for sessions and log lines
 */
import { v4 as uuidv4 } from 'uuid'

const RUN_ID_ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789'

/**
 * Generate a short random token used to tell concurrent sessions apart in logs
 * @param length Number of characters (default 5)
 */
export function generateRunId(length = 5): string {
  const bytes = new Uint8Array(length)
  crypto.getRandomValues(bytes)

  return Array.from(bytes)
    .map(b => RUN_ID_ALPHABET.charAt(b % RUN_ID_ALPHABET.length))
    .join('')
}

/**
 * Generate the client identifier presented to the portal (UUID v4, upper case)
 */
export function generateClientId(): string {
  return uuidv4().toUpperCase()
}

/**
 * Validate client identifier format
 */
export function isValidClientId(clientId: string): boolean {
  return /^[0-9A-F]{8}-[0-9A-F]{4}-4[0-9A-F]{3}-[89AB][0-9A-F]{3}-[0-9A-F]{12}$/.test(clientId)
}
