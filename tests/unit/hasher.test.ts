/**
 * Hash producer and value encoding tests
 */

import { describe, it, expect } from 'vitest'
import {
  XxHash64Builder,
  hashIndices,
  hashValue,
  hashWith,
  sameHashers,
  type BuildHasher,
  type Hasher,
  type HashValue,
} from '../../src/hash/hasher'
import { xxHash64 } from '../../src/hash/xxhash64'

/**
 * Hasher that records every byte written to it
 */
class RecordingHasher implements Hasher {
  readonly bytes: number[] = []

  write(bytes: Uint8Array): void {
    this.bytes.push(...bytes)
  }

  finish(): bigint {
    return BigInt(this.bytes.length)
  }
}

function encoded(value: HashValue): number[] {
  const hasher = new RecordingHasher()
  hashValue(value, hasher)
  return hasher.bytes
}

/**
 * Producer that counts how many hashers it has handed out
 */
class CountingProducer implements BuildHasher {
  built = 0

  buildHasher(): Hasher {
    this.built++
    return new RecordingHasher()
  }
}

describe('hashValue', () => {
  it('should encode primitives with a type tag', () => {
    expect(encoded(undefined)).toEqual([0x00])
    expect(encoded(null)).toEqual([0x01])
    expect(encoded(false)).toEqual([0x02])
    expect(encoded(true)).toEqual([0x03])
  })

  it('should encode numbers as little-endian float64', () => {
    expect(encoded(1)).toEqual([0x04, 0, 0, 0, 0, 0, 0, 0xf0, 0x3f])
  })

  it('should encode -0 like 0', () => {
    expect(encoded(-0)).toEqual(encoded(0))
    expect(encoded(0)).toEqual([0x04, 0, 0, 0, 0, 0, 0, 0, 0])
  })

  it('should length-prefix strings', () => {
    expect(encoded('ab')).toEqual([0x06, 2, 0, 0, 0, 0x61, 0x62])
  })

  it('should encode bigints by their hex digits', () => {
    expect(encoded(255n)).toEqual([0x05, 2, 0, 0, 0, 0x66, 0x66])
  })

  it('should length-prefix byte arrays', () => {
    expect(encoded(Uint8Array.of(1, 2))).toEqual([0x07, 2, 0, 0, 0, 1, 2])
  })

  it('should encode dates by their timestamp', () => {
    expect(encoded(new Date(1))).toEqual(encoded(1).map((b, i) => (i === 0 ? 0x08 : b)))
  })

  it('should prefix arrays with their element count', () => {
    expect(encoded(['a'])).toEqual([0x09, 1, 0, 0, 0, 0x06, 1, 0, 0, 0, 0x61])
  })

  it('should keep differently split strings apart', () => {
    expect(encoded(['ab', 'c'])).not.toEqual(encoded(['a', 'bc']))
  })

  it('should keep the same digits of different types apart', () => {
    expect(encoded(48)).not.toEqual(encoded('48'))
    expect(encoded(48)).not.toEqual(encoded(48n))
  })

  it('should let Hashable values feed their own bytes', () => {
    const point = {
      x: 3,
      y: 4,
      hashInto(hasher: Hasher): void {
        hasher.write(Uint8Array.of(this.x, this.y))
      },
    }
    expect(encoded(point)).toEqual([0x0a, 3, 4])
  })
})

describe('XxHash64Builder', () => {
  it('should hash the encoded value with its seed', () => {
    const producer = XxHash64Builder.withSeed(7n)
    expect(hashWith(producer, 'ab')).toBe(xxHash64(Uint8Array.of(0x06, 2, 0, 0, 0, 0x61, 0x62), 7n))
  })

  it('should give the same digest for producers with the same seed', () => {
    const a = XxHash64Builder.withSeed(99n)
    const b = XxHash64Builder.withSeed(99n)
    expect(hashWith(a, [1, 'two', 3n])).toBe(hashWith(b, [1, 'two', 3n]))
  })

  it('should concatenate multiple writes before hashing', () => {
    const hasher = XxHash64Builder.withSeed(5n).buildHasher()
    hasher.write(Uint8Array.of(1, 2, 3))
    hasher.write(Uint8Array.of(4, 5))
    expect(hasher.finish()).toBe(xxHash64(Uint8Array.of(1, 2, 3, 4, 5), 5n))
  })

  it('should copy written buffers', () => {
    const hasher = XxHash64Builder.withSeed(5n).buildHasher()
    const buffer = Uint8Array.of(1, 2, 3)
    hasher.write(buffer)
    buffer[0] = 9
    expect(hasher.finish()).toBe(xxHash64(Uint8Array.of(1, 2, 3), 5n))
  })

  it('should draw a random seed by default', () => {
    const a = new XxHash64Builder()
    const b = new XxHash64Builder()
    expect(a.seed).not.toBe(b.seed)
    expect(a.equals(b)).toBe(false)
  })

  it('should compare equal by seed', () => {
    expect(XxHash64Builder.withSeed(1n).equals(XxHash64Builder.withSeed(1n))).toBe(true)
    expect(XxHash64Builder.withSeed(1n).equals(XxHash64Builder.withSeed(2n))).toBe(false)
    expect(XxHash64Builder.withSeed(1n).equals(new CountingProducer())).toBe(false)
  })
})

describe('sameHashers', () => {
  it('should accept the same list', () => {
    const list = [new XxHash64Builder(), new XxHash64Builder()]
    expect(sameHashers(list, list)).toBe(true)
  })

  it('should accept lists of identical producers', () => {
    const p = new CountingProducer()
    const q = new CountingProducer()
    expect(sameHashers([p, q], [p, q])).toBe(true)
  })

  it('should accept producers that report equality', () => {
    const a = [XxHash64Builder.withSeed(1n), XxHash64Builder.withSeed(2n)]
    const b = [XxHash64Builder.withSeed(1n), XxHash64Builder.withSeed(2n)]
    expect(sameHashers(a, b)).toBe(true)
  })

  it('should reject lists that differ in order, seed or length', () => {
    const a = [XxHash64Builder.withSeed(1n), XxHash64Builder.withSeed(2n)]
    expect(sameHashers(a, [XxHash64Builder.withSeed(2n), XxHash64Builder.withSeed(1n)])).toBe(false)
    expect(sameHashers(a, [XxHash64Builder.withSeed(1n), XxHash64Builder.withSeed(3n)])).toBe(false)
    expect(sameHashers(a, [XxHash64Builder.withSeed(1n)])).toBe(false)
  })

  it('should reject distinct producers that cannot compare themselves', () => {
    expect(sameHashers([new CountingProducer()], [new CountingProducer()])).toBe(false)
  })
})

describe('hashIndices', () => {
  const producers = [1n, 2n, 3n, 4n, 5n].map((seed) => XxHash64Builder.withSeed(seed))

  it('should yield one index per producer, digest mod size', () => {
    const indices = [...hashIndices(producers, 20, 'value')]
    expect(indices).toEqual(producers.map((p) => Number(hashWith(p, 'value') % 20n)))
  })

  it('should keep every index within the storage size', () => {
    for (let v = 0; v < 200; v++) {
      for (const i of hashIndices(producers, 13, v)) {
        expect(i).toBeGreaterThanOrEqual(0)
        expect(i).toBeLessThan(13)
      }
    }
  })

  it('should not deduplicate colliding positions', () => {
    const p = XxHash64Builder.withSeed(11n)
    const indices = [...hashIndices([p, p, p], 50, 'dup')]
    expect(indices).toHaveLength(3)
    expect(new Set(indices).size).toBe(1)
  })

  it('should be deterministic', () => {
    expect([...hashIndices(producers, 1000, [1, 2])]).toEqual([...hashIndices(producers, 1000, [1, 2])])
  })

  it('should hash lazily, one producer per step', () => {
    const first = new CountingProducer()
    const second = new CountingProducer()
    const indices = hashIndices([first, second], 10, 'lazy')
    expect(first.built).toBe(0)

    indices.next()
    expect(first.built).toBe(1)
    expect(second.built).toBe(0)

    indices.next()
    expect(second.built).toBe(1)
  })
})
