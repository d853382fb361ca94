/**
 * Random seeds for hash producers
 *
 * Uses the Web Crypto API exposed on `globalThis.crypto` (Node.js >= 19).
 *
 * @module utils/random
 */

export function getRandomBytes(length: number): Uint8Array {
  const bytes = new Uint8Array(length)
  crypto.getRandomValues(bytes)
  return bytes
}

/**
 * A uniformly random unsigned 64-bit integer
 */
export function getRandomSeed64(): bigint {
  const bytes = getRandomBytes(8)
  return new DataView(bytes.buffer).getBigUint64(0, true)
}
