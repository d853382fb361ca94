/**
 * Counter Types
 *
 * The numeric operations a saturating counter needs: a zero, a one, a maximum
 * that acts as the saturation point, saturating addition, subtraction and a
 * total order. Each descriptor also allocates zero-filled storage for its
 * counters.
 */

/**
 * Indexable, fixed-length counter storage. Typed arrays satisfy this.
 */
export interface CounterArray<C> {
  readonly length: number
  [index: number]: C
  fill(value: C): unknown
  set(values: ArrayLike<C>): void
}

export interface CounterType<C> {
  /** Short name for diagnostics, e.g. `u8` */
  readonly name: string
  readonly zero: C
  readonly one: C
  /** Largest representable count; a counter here is saturated */
  readonly max: C
  /** `a + b`, clamped at `max` */
  saturatingAdd(a: C, b: C): C
  /** `a - b`; only called with `a >= b` */
  sub(a: C, b: C): C
  compare(a: C, b: C): number
  /** Zero-filled storage for `count` counters */
  allocate(count: number): CounterArray<C>
}

function numberCounter(
  name: string,
  max: number,
  allocate: (count: number) => CounterArray<number>
): CounterType<number> {
  return {
    name,
    zero: 0,
    one: 1,
    max,
    saturatingAdd: (a, b) => Math.min(a + b, max),
    sub: (a, b) => a - b,
    compare: (a, b) => a - b,
    allocate,
  }
}

/** 8-bit counters (saturate at 255) */
export const u8: CounterType<number> = numberCounter('u8', 0xff, (count) => new Uint8Array(count))

/** 16-bit counters (saturate at 65535) */
export const u16: CounterType<number> = numberCounter('u16', 0xffff, (count) => new Uint16Array(count))

/** 32-bit counters (saturate at 2^32 - 1) */
export const u32: CounterType<number> = numberCounter('u32', 0xffffffff, (count) => new Uint32Array(count))

const U64_MAX = 0xffffffffffffffffn

/** 64-bit counters as BigInt (saturate at 2^64 - 1) */
export const u64: CounterType<bigint> = {
  name: 'u64',
  zero: 0n,
  one: 1n,
  max: U64_MAX,
  saturatingAdd: (a, b) => (a + b > U64_MAX ? U64_MAX : a + b),
  sub: (a, b) => a - b,
  compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
  allocate: (count) => new BigUint64Array(count),
}
