/**
 * Saturating-count storage for counting and spectral Bloom filters.
 *
 * Each counter is a bounded non-negative integer of the chosen `CounterType`:
 * - increment adds one, sticking at `max` instead of overflowing
 * - decrement subtracts one, but leaves a counter alone at zero and at `max`
 *   (a saturated counter's true value is unknown, so it is never lowered)
 * - query reports `count > 0`
 *
 * Pointwise max/min combination is not offered, so this storage does not
 * implement `BinaryBloomSet`.
 */

import type { BloomSetFactory, DeletableBloomSet, SpectralBloomSet } from '../types/set'
import { checkIndex } from './check'
import type { CounterArray, CounterType } from './counters'
import { u8 } from './counters'

export class CountingBloomSet<C> implements DeletableBloomSet, SpectralBloomSet<C> {
  readonly type: CounterType<C>
  private readonly counts: CounterArray<C>

  constructor(count: number, type: CounterType<C>) {
    this.type = type
    this.counts = type.allocate(count)
  }

  /**
   * Storage holding a copy of `counts`, one counter per element.
   */
  static fromCounts<C>(type: CounterType<C>, counts: ArrayLike<C>): CountingBloomSet<C> {
    const set = new CountingBloomSet(counts.length, type)
    set.counts.set(counts)
    return set
  }

  size(): number {
    return this.counts.length
  }

  increment(index: number): void {
    this.counts[index] = this.type.saturatingAdd(this.queryCount(index), this.type.one)
  }

  decrement(index: number): void {
    const type = this.type
    const current = this.queryCount(index)
    if (type.compare(current, type.zero) > 0 && type.compare(current, type.max) !== 0) {
      this.counts[index] = type.sub(current, type.one)
    }
  }

  clear(): void {
    this.counts.fill(this.type.zero)
  }

  query(index: number): boolean {
    return this.type.compare(this.queryCount(index), this.type.zero) > 0
  }

  queryCount(index: number): C {
    checkIndex(index, this.counts.length)
    return this.counts[index] ?? this.type.zero
  }

  compareCounts(a: C, b: C): number {
    return this.type.compare(a, b)
  }

  clone(): CountingBloomSet<C> {
    return CountingBloomSet.fromCounts(this.type, this.counts)
  }

  equals(other: CountingBloomSet<C>): boolean {
    if (other.type !== this.type || other.counts.length !== this.counts.length) return false
    for (let i = 0; i < this.counts.length; i++) {
      if (this.type.compare(this.queryCount(i), other.queryCount(i)) !== 0) return false
    }
    return true
  }
}

/**
 * Factory for counting storage with the given counter width (8-bit by default).
 *
 * @example
 * ```typescript
 * const filter = SimpleBloomFilter.create(10, 20, countingSet(u16))
 * ```
 */
export function countingSet(): BloomSetFactory<CountingBloomSet<number>>
export function countingSet<C>(type: CounterType<C>): BloomSetFactory<CountingBloomSet<C>>
export function countingSet<C>(
  type?: CounterType<C>
): BloomSetFactory<CountingBloomSet<C>> | BloomSetFactory<CountingBloomSet<number>> {
  if (type === undefined) {
    return (count) => new CountingBloomSet(count, u8)
  }
  return (count) => new CountingBloomSet(count, type)
}
