/**
 * Hash Producers and Value Hashing
 *
 * A filter holds `k` hash producers (`BuildHasher`). Each one is a keyed hash
 * function: it hands out fresh `Hasher` states which accumulate bytes and
 * finish into a 64-bit digest. Values reach a hasher through `hashValue`,
 * which turns strings, numbers, byte arrays, arrays and user types that
 * implement `Hashable` into a type-tagged byte stream.
 */

import { getRandomSeed64 } from '../utils/random'
import { xxHash64 } from './xxhash64'

// =============================================================================
// Hasher Contracts
// =============================================================================

/**
 * Streaming hash state.
 */
export interface Hasher {
  write(bytes: Uint8Array): void
  /** Unsigned 64-bit digest of everything written so far */
  finish(): bigint
}

/**
 * A keyed hash function. Two producers built from the same algorithm and key
 * must map every value to the same digest.
 */
export interface BuildHasher {
  buildHasher(): Hasher
  /** Whether `other` is known to hash identically to this producer */
  equals?(other: BuildHasher): boolean
}

/**
 * A user type that knows how to feed itself to a hasher.
 */
export interface Hashable {
  hashInto(hasher: Hasher): void
}

export type HashValue =
  | string
  | number
  | bigint
  | boolean
  | null
  | undefined
  | Uint8Array
  | Date
  | Hashable
  | readonly HashValue[]

// =============================================================================
// Default Producer
// =============================================================================

class XxHash64Hasher implements Hasher {
  private readonly chunks: Uint8Array[] = []
  private length = 0

  constructor(private readonly seed: bigint) {}

  write(bytes: Uint8Array): void {
    // Callers may reuse their buffers
    this.chunks.push(bytes.slice())
    this.length += bytes.length
  }

  finish(): bigint {
    if (this.chunks.length === 1 && this.chunks[0] !== undefined) {
      return xxHash64(this.chunks[0], this.seed)
    }
    const data = new Uint8Array(this.length)
    let offset = 0
    for (const chunk of this.chunks) {
      data.set(chunk, offset)
      offset += chunk.length
    }
    return xxHash64(data, this.seed)
  }
}

/**
 * xxHash64 keyed by a 64-bit seed. `new XxHash64Builder()` draws a random
 * seed, so independently created producers behave as independent hash
 * functions.
 */
export class XxHash64Builder implements BuildHasher {
  readonly seed: bigint

  constructor(seed?: bigint) {
    this.seed = seed === undefined ? getRandomSeed64() : BigInt.asUintN(64, seed)
  }

  static withSeed(seed: bigint): XxHash64Builder {
    return new XxHash64Builder(seed)
  }

  buildHasher(): Hasher {
    return new XxHash64Hasher(this.seed)
  }

  equals(other: BuildHasher): boolean {
    return other instanceof XxHash64Builder && other.seed === this.seed
  }
}

/**
 * True when two producer lists are known to hash identically: the same list,
 * or pairwise identical or `equals` producers.
 */
export function sameHashers(a: readonly BuildHasher[], b: readonly BuildHasher[]): boolean {
  if (a === b) return true
  if (a.length !== b.length) return false
  return a.every((hasher, i) => {
    const other = b[i]
    if (other === undefined) return false
    return hasher === other || hasher.equals?.(other) === true
  })
}

// =============================================================================
// Value Encoding
// =============================================================================

enum Tag {
  Undefined = 0x00,
  Null = 0x01,
  False = 0x02,
  True = 0x03,
  Number = 0x04,
  BigInt = 0x05,
  String = 0x06,
  Bytes = 0x07,
  Date = 0x08,
  Array = 0x09,
  Custom = 0x0a,
}

const encoder = new TextEncoder()

function tag(hasher: Hasher, t: Tag): void {
  hasher.write(Uint8Array.of(t))
}

function writeU32(hasher: Hasher, n: number): void {
  const bytes = new Uint8Array(4)
  new DataView(bytes.buffer).setUint32(0, n, true)
  hasher.write(bytes)
}

function writeF64(hasher: Hasher, n: number): void {
  const bytes = new Uint8Array(8)
  // -0 and 0 compare equal, so they must hash equal
  new DataView(bytes.buffer).setFloat64(0, n === 0 ? 0 : n, true)
  hasher.write(bytes)
}

function isHashable(value: object): value is Hashable {
  return 'hashInto' in value && typeof value.hashInto === 'function'
}

/**
 * Feed `value` to `hasher`.
 *
 * Strings and byte arrays are length prefixed and arrays carry their element
 * count, so `['ab', 'c']` and `['a', 'bc']` produce different streams.
 */
export function hashValue(value: HashValue, hasher: Hasher): void {
  if (value === undefined) {
    tag(hasher, Tag.Undefined)
  } else if (value === null) {
    tag(hasher, Tag.Null)
  } else if (typeof value === 'boolean') {
    tag(hasher, value ? Tag.True : Tag.False)
  } else if (typeof value === 'number') {
    tag(hasher, Tag.Number)
    writeF64(hasher, value)
  } else if (typeof value === 'bigint') {
    tag(hasher, Tag.BigInt)
    const text = encoder.encode(value.toString(16))
    writeU32(hasher, text.length)
    hasher.write(text)
  } else if (typeof value === 'string') {
    tag(hasher, Tag.String)
    const bytes = encoder.encode(value)
    writeU32(hasher, bytes.length)
    hasher.write(bytes)
  } else if (value instanceof Uint8Array) {
    tag(hasher, Tag.Bytes)
    writeU32(hasher, value.length)
    hasher.write(value)
  } else if (value instanceof Date) {
    tag(hasher, Tag.Date)
    writeF64(hasher, value.getTime())
  } else if (Array.isArray(value)) {
    tag(hasher, Tag.Array)
    writeU32(hasher, value.length)
    for (const item of value) {
      hashValue(item, hasher)
    }
  } else if (isHashable(value)) {
    tag(hasher, Tag.Custom)
    value.hashInto(hasher)
  }
}

/**
 * Digest of `value` under one producer.
 */
export function hashWith(producer: BuildHasher, value: HashValue): bigint {
  const hasher = producer.buildHasher()
  hashValue(value, hasher)
  return hasher.finish()
}

// =============================================================================
// Index Computation
// =============================================================================

/**
 * Storage positions for `value`: one per producer, in producer order, each
 * `digest mod size`. Positions are not deduplicated, so two producers landing
 * on the same counter touch it twice.
 */
export function* hashIndices(
  hashers: readonly BuildHasher[],
  size: number,
  value: HashValue
): Generator<number, void, undefined> {
  const m = BigInt(size)
  for (const producer of hashers) {
    yield Number(hashWith(producer, value) % m)
  }
}
