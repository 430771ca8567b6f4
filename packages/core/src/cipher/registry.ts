import { CipherError, Result, toError } from '../types/error.types.js'
import { createKeyedCipher } from './keyed.js'
import { PassthroughCipher } from './passthrough.js'
import type { Cipher, CipherContext, CipherFactory, KeyedCipherSpec } from './types.js'
import { ZERO_ALGO_ID } from './types.js'

/**
 * Maps portal algorithm ids to cipher factories
 *
 * Only the zero id (passthrough) is registered by default; real portal
 * algorithms are plugged in with `register` or through configured keys.
 */
export class CipherRegistry {
  private readonly factories = new Map<string, CipherFactory>()

  constructor() {
    this.register(ZERO_ALGO_ID, algoId => new PassthroughCipher(algoId))
  }

  /**
   * Registry pre-loaded with keyed ciphers from configuration
   */
  static fromKeys(keys: Record<string, KeyedCipherSpec> = {}): CipherRegistry {
    const registry = new CipherRegistry()
    for (const [algoId, spec] of Object.entries(keys)) {
      registry.register(algoId, id => createKeyedCipher(id, spec))
    }
    return registry
  }

  register(algoId: string, factory: CipherFactory): this {
    this.factories.set(normalizeAlgoId(algoId), factory)
    return this
  }

  has(algoId: string): boolean {
    return this.factories.has(normalizeAlgoId(algoId))
  }

  create(algoId: string, context: CipherContext): Result<Cipher, CipherError> {
    const factory = this.factories.get(normalizeAlgoId(algoId))
    if (!factory) {
      return Result.error(new CipherError(`unsupported algorithm id: ${algoId}`))
    }

    try {
      return Result.ok(factory(algoId, context))
    } catch (error) {
      if (error instanceof CipherError) {
        return Result.error(error)
      }
      return Result.error(new CipherError(toError(error).message, { algoId }))
    }
  }
}

function normalizeAlgoId(algoId: string): string {
  return algoId.trim().toUpperCase()
}
