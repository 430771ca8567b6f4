export type {
  Cipher,
  CipherContext,
  CipherFactory,
  KeyedCipherAlgorithm,
  KeyedCipherSpec,
} from './types.js'
export { ZERO_ALGO_ID } from './types.js'
export { PassthroughCipher } from './passthrough.js'
export { createKeyedCipher } from './keyed.js'
export { CipherRegistry } from './registry.js'
