/**
 * Block ciphers keyed from configuration
 *
 * Wire format is upper-case hex. GCM output is `iv || ciphertext || tag`
 * with a fresh 12-byte IV per message.
 */
import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto'
import { CipherError } from '../types/error.types.js'
import type { Cipher, KeyedCipherAlgorithm, KeyedCipherSpec } from './types.js'

const KEY_LENGTHS: Record<KeyedCipherAlgorithm, number> = {
  'aes-128-cbc': 16,
  'aes-256-cbc': 32,
  'aes-256-gcm': 32,
}

const BLOCK_SIZE = 16
const GCM_IV_LENGTH = 12
const GCM_TAG_LENGTH = 16

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/

function decodeHex(value: string, field: string): Buffer {
  if (!HEX_PATTERN.test(value)) {
    throw new CipherError(`${field} is not valid hex`)
  }
  return Buffer.from(value, 'hex')
}

class CbcCipher implements Cipher {
  constructor(
    public readonly algoId: string,
    private readonly algorithm: 'aes-128-cbc' | 'aes-256-cbc',
    private readonly key: Buffer,
    private readonly iv: Buffer
  ) {}

  seal(plaintext: string): string {
    const cipher = createCipheriv(this.algorithm, this.key, this.iv)
    return Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()])
      .toString('hex')
      .toUpperCase()
  }

  open(wire: string): string {
    const data = decodeHex(wire.trim(), 'ciphertext')
    try {
      const decipher = createDecipheriv(this.algorithm, this.key, this.iv)
      return Buffer.concat([decipher.update(data), decipher.final()]).toString('utf8')
    } catch (error) {
      throw new CipherError(`failed to decrypt payload with ${this.algoId}`, { cause: error })
    }
  }
}

class GcmCipher implements Cipher {
  constructor(
    public readonly algoId: string,
    private readonly key: Buffer
  ) {}

  seal(plaintext: string): string {
    const iv = randomBytes(GCM_IV_LENGTH)
    const cipher = createCipheriv('aes-256-gcm', this.key, iv)
    const body = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()])
    return Buffer.concat([iv, body, cipher.getAuthTag()]).toString('hex').toUpperCase()
  }

  open(wire: string): string {
    const data = decodeHex(wire.trim(), 'ciphertext')
    if (data.length < GCM_IV_LENGTH + GCM_TAG_LENGTH) {
      throw new CipherError('ciphertext too short')
    }
    const iv = data.subarray(0, GCM_IV_LENGTH)
    const tag = data.subarray(data.length - GCM_TAG_LENGTH)
    const body = data.subarray(GCM_IV_LENGTH, data.length - GCM_TAG_LENGTH)
    try {
      const decipher = createDecipheriv('aes-256-gcm', this.key, iv)
      decipher.setAuthTag(tag)
      return Buffer.concat([decipher.update(body), decipher.final()]).toString('utf8')
    } catch (error) {
      throw new CipherError(`failed to decrypt payload with ${this.algoId}`, { cause: error })
    }
  }
}

/**
 * Build a cipher for `algoId` from configured key material
 * @throws CipherError when the key or IV has the wrong length
 */
export function createKeyedCipher(algoId: string, spec: KeyedCipherSpec): Cipher {
  const key = decodeHex(spec.key, 'key')
  const expected = KEY_LENGTHS[spec.type]
  if (key.length !== expected) {
    throw new CipherError(`${spec.type} needs a ${expected}-byte key, got ${key.length}`)
  }

  if (spec.type === 'aes-256-gcm') {
    return new GcmCipher(algoId, key)
  }

  const iv = decodeHex(spec.iv ?? '', 'iv')
  if (iv.length !== BLOCK_SIZE) {
    throw new CipherError(`${spec.type} needs a ${BLOCK_SIZE}-byte iv, got ${iv.length}`)
  }
  return new CbcCipher(algoId, spec.type, key, iv)
}
