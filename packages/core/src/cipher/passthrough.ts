import type { Cipher } from './types.js'

/**
 * Identity cipher used before any algorithm has been negotiated
 */
export class PassthroughCipher implements Cipher {
  constructor(public readonly algoId: string) {}

  seal(plaintext: string): string {
    return plaintext
  }

  open(wire: string): string {
    return wire
  }
}
