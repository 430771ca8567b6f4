/**
 * Cipher capability securing the state-exchange payloads
 */

/** Algorithm id meaning "no cipher negotiated yet" */
export const ZERO_ALGO_ID = '00000000-0000-0000-0000-000000000000'

export interface Cipher {
  readonly algoId: string
  /** Turn a plaintext payload into its transmittable form */
  seal(plaintext: string): string
  /** Recover the plaintext from a portal response body */
  open(wire: string): string
}

/**
 * Session secrets a cipher may be keyed by
 */
export interface CipherContext {
  clientId: string
  ticket: string
}

export type CipherFactory = (algoId: string, context: CipherContext) => Cipher

export type KeyedCipherAlgorithm = 'aes-128-cbc' | 'aes-256-cbc' | 'aes-256-gcm'

/**
 * Key material for an algorithm id, supplied through configuration
 */
export interface KeyedCipherSpec {
  type: KeyedCipherAlgorithm
  /** Hex-encoded key */
  key: string
  /** Hex-encoded IV; required for CBC modes, ignored for GCM */
  iv?: string
}
