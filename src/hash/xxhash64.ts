/**
 * Seeded xxHash64
 *
 * 64-bit xxHash (specification 0.1.1) over a byte array with a caller chosen
 * seed. Arithmetic is done on BigInt and masked to 64 bits after every step.
 *
 * @see https://github.com/Cyan4973/xxHash/blob/dev/doc/xxhash_spec.md
 */

const PRIME64_1 = 0x9e3779b185ebca87n
const PRIME64_2 = 0xc2b2ae3d27d4eb4fn
const PRIME64_3 = 0x165667b19e3779f9n
const PRIME64_4 = 0x85ebca77c2b2ae63n
const PRIME64_5 = 0x27d4eb2f165667c5n

const MASK64 = 0xffffffffffffffffn

function rotl64(x: bigint, r: number): bigint {
  return ((x << BigInt(r)) | (x >> BigInt(64 - r))) & MASK64
}

function readLE64(view: DataView, offset: number): bigint {
  return view.getBigUint64(offset, true)
}

function readLE32(view: DataView, offset: number): bigint {
  return BigInt(view.getUint32(offset, true))
}

function round(acc: bigint, input: bigint): bigint {
  acc = (acc + input * PRIME64_2) & MASK64
  acc = rotl64(acc, 31)
  return (acc * PRIME64_1) & MASK64
}

function mergeRound(acc: bigint, val: bigint): bigint {
  acc = (acc ^ round(0n, val)) & MASK64
  return (acc * PRIME64_1 + PRIME64_4) & MASK64
}

function avalanche(h64: bigint): bigint {
  h64 = (h64 ^ (h64 >> 33n)) & MASK64
  h64 = (h64 * PRIME64_2) & MASK64
  h64 = (h64 ^ (h64 >> 29n)) & MASK64
  h64 = (h64 * PRIME64_3) & MASK64
  h64 = (h64 ^ (h64 >> 32n)) & MASK64
  return h64
}

/**
 * Compute xxHash64 of `data`.
 *
 * @param seed - 64-bit seed, reduced modulo 2^64
 * @returns Unsigned 64-bit digest
 */
export function xxHash64(data: Uint8Array, seed: bigint = 0n): bigint {
  const s = BigInt.asUintN(64, seed)
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength)
  const len = data.length
  let offset = 0
  let h64: bigint

  if (len >= 32) {
    let v1 = (s + PRIME64_1 + PRIME64_2) & MASK64
    let v2 = (s + PRIME64_2) & MASK64
    let v3 = s
    let v4 = (s - PRIME64_1) & MASK64

    const limit = len - 32
    while (offset <= limit) {
      v1 = round(v1, readLE64(view, offset))
      v2 = round(v2, readLE64(view, offset + 8))
      v3 = round(v3, readLE64(view, offset + 16))
      v4 = round(v4, readLE64(view, offset + 24))
      offset += 32
    }

    h64 = (rotl64(v1, 1) + rotl64(v2, 7) + rotl64(v3, 12) + rotl64(v4, 18)) & MASK64
    h64 = mergeRound(h64, v1)
    h64 = mergeRound(h64, v2)
    h64 = mergeRound(h64, v3)
    h64 = mergeRound(h64, v4)
  } else {
    h64 = (s + PRIME64_5) & MASK64
  }

  h64 = (h64 + BigInt(len)) & MASK64

  while (offset + 8 <= len) {
    h64 = (h64 ^ round(0n, readLE64(view, offset))) & MASK64
    h64 = (rotl64(h64, 27) * PRIME64_1 + PRIME64_4) & MASK64
    offset += 8
  }

  if (offset + 4 <= len) {
    h64 = (h64 ^ ((readLE32(view, offset) * PRIME64_1) & MASK64)) & MASK64
    h64 = (rotl64(h64, 23) * PRIME64_2 + PRIME64_3) & MASK64
    offset += 4
  }

  while (offset < len) {
    h64 = (h64 ^ ((BigInt(view.getUint8(offset)) * PRIME64_5) & MASK64)) & MASK64
    h64 = (rotl64(h64, 11) * PRIME64_1) & MASK64
    offset++
  }

  return avalanche(h64)
}
