/**
 * SimpleBloomFilter
 *
 * A Bloom filter over any `BloomSet`. Each of the `k` hash producers maps a
 * value to one counter (`digest mod m`); every operation walks those `k`
 * positions. What the filter supports follows from its storage:
 *
 * | storage            | insert/contains/clear | remove | union/intersect | findCount |
 * |--------------------|-----------------------|--------|-----------------|-----------|
 * | BitSet             | yes                   |        | yes             |           |
 * | CountingBloomSet   | yes                   | yes    |                 | yes       |
 *
 * Calling an operation the storage cannot back is a type error.
 *
 * @example
 * ```typescript
 * const filter = SimpleBloomFilter.create(10, 20, bitSet)
 * filter.insert(48)
 * filter.insert(32)
 * filter.contains(48) // true
 * filter.contains(39) // false, unless 39 is a false positive
 * ```
 */

import { resolveFilterOptions } from '../config'
import { ContractViolationError, ErrorCode } from '../errors'
import { hashIndices, sameHashers, XxHash64Builder } from '../hash/hasher'
import type { BuildHasher, HashValue } from '../hash/hasher'
import type { BloomFilter } from '../types/filter'
import type {
  BinaryBloomSet,
  BloomSet,
  BloomSetFactory,
  DeletableBloomSet,
  SpectralBloomSet,
} from '../types/set'
import { logger } from '../utils/logger'

export class SimpleBloomFilter<S extends BloomSet> implements BloomFilter<S> {
  private readonly hashProducers: readonly BuildHasher[]
  private readonly set: S

  private constructor(hashProducers: readonly BuildHasher[], set: S) {
    this.hashProducers = hashProducers
    this.set = set
  }

  // ===========================================================================
  // Construction
  // ===========================================================================

  /**
   * Create a filter with `nHashers` fresh hash producers and `nCounters`
   * zeroed counters.
   *
   * @param makeHasher - Producer constructor, randomly seeded xxHash64 by default
   */
  static create<S extends BloomSet>(
    nHashers: number,
    nCounters: number,
    factory: BloomSetFactory<S>,
    makeHasher: () => BuildHasher = () => new XxHash64Builder()
  ): SimpleBloomFilter<S> {
    checkHasherCount(nHashers)
    return SimpleBloomFilter.withHashers(Array.from({ length: nHashers }, makeHasher), nCounters, factory)
  }

  /**
   * Create a filter around existing hash producers. Pass another filter's
   * `hashers()` to build a filter that can be combined with it.
   */
  static withHashers<S extends BloomSet>(
    hashers: readonly BuildHasher[],
    nCounters: number,
    factory: BloomSetFactory<S>
  ): SimpleBloomFilter<S> {
    checkHasherCount(hashers.length)
    if (!Number.isInteger(nCounters) || nCounters < 1) {
      throw new ContractViolationError(
        `A Bloom filter needs at least one counter, got ${nCounters}`,
        ErrorCode.EMPTY_STORAGE,
        { counters: nCounters }
      )
    }

    const shared = Object.isFrozen(hashers) ? hashers : Object.freeze([...hashers])
    logger.debug(`Creating Bloom filter with ${shared.length} hashers over ${nCounters} counters`)
    return new SimpleBloomFilter(shared, factory(nCounters))
  }

  /**
   * Create a filter from an unvalidated options object.
   *
   * @throws ConfigurationError when `hashers` or `counters` is not a positive integer
   */
  static fromOptions<S extends BloomSet>(options: unknown, factory: BloomSetFactory<S>): SimpleBloomFilter<S> {
    const { hashers, counters } = resolveFilterOptions(options)
    return SimpleBloomFilter.create(hashers, counters, factory)
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  counters(): S {
    return this.set
  }

  hashers(): readonly BuildHasher[] {
    return this.hashProducers
  }

  /**
   * The producers and storage, for callers taking the filter apart.
   */
  intoInner(): { hashers: readonly BuildHasher[]; set: S } {
    return { hashers: this.hashProducers, set: this.set }
  }

  // ===========================================================================
  // Universal Operations
  // ===========================================================================

  insert(value: HashValue): void {
    for (const i of this.indices(value)) {
      this.set.increment(i)
    }
  }

  contains(value: HashValue): boolean {
    for (const i of this.indices(value)) {
      if (!this.set.query(i)) {
        return false
      }
    }
    return true
  }

  clear(): void {
    this.set.clear()
  }

  /**
   * A filter sharing this filter's producers over a copy of its storage.
   */
  clone<K extends BloomSet & { clone(): K }>(this: SimpleBloomFilter<K>): SimpleBloomFilter<K> {
    return new SimpleBloomFilter(this.hashProducers, this.set.clone())
  }

  /**
   * Equal when both filters use known-equivalent producers and their
   * storage holds identical counters.
   */
  equals<K extends BloomSet & { equals(other: K): boolean }>(
    this: SimpleBloomFilter<K>,
    other: SimpleBloomFilter<K>
  ): boolean {
    return sameHashers(this.hashProducers, other.hashProducers) && this.set.equals(other.set)
  }

  // ===========================================================================
  // Deletion
  // ===========================================================================

  /**
   * Remove one insert of `value`.
   *
   * **If `value` was not inserted (or is removed more often than it was
   * inserted), other values sharing its counters may start to test absent.**
   *
   * @example
   * ```typescript
   * const f = SimpleBloomFilter.create(10, 20, countingSet())
   * for (let x = 0; x < 30; x++) f.insert(x)
   * const before = f.contains(30)
   * f.insert(30)
   * f.remove(30)
   * f.contains(30) === before // true
   * ```
   */
  remove<D extends DeletableBloomSet>(this: SimpleBloomFilter<D>, value: HashValue): void {
    for (const i of this.indices(value)) {
      this.set.decrement(i)
    }
  }

  // ===========================================================================
  // Set Operations
  // ===========================================================================

  /**
   * Insert every value of `other` into this filter.
   *
   * **Both filters must use equivalent hash producers, which cannot be
   * checked in general.** Build the second filter with
   * `SimpleBloomFilter.withHashers(first.hashers(), ...)`.
   */
  union<B extends BinaryBloomSet>(this: SimpleBloomFilter<B>, other: BloomFilter<B>): void {
    this.warnUnlessSameHashers('union', other)
    this.set.union(other.counters())
  }

  /**
   * Keep only values also present in `other`, under the same producer
   * precondition as `union`.
   */
  intersect<B extends BinaryBloomSet>(this: SimpleBloomFilter<B>, other: BloomFilter<B>): void {
    this.warnUnlessSameHashers('intersect', other)
    this.set.intersect(other.counters())
  }

  // ===========================================================================
  // Count Queries
  // ===========================================================================

  /**
   * Whether every counter for `value` is strictly greater than `count`.
   */
  containsMoreThan<C>(this: SimpleBloomFilter<SpectralBloomSet<C>>, value: HashValue, count: C): boolean {
    for (const i of this.indices(value)) {
      if (this.set.compareCounts(this.set.queryCount(i), count) <= 0) {
        return false
      }
    }
    return true
  }

  /**
   * Smallest counter among the positions of `value`: an estimate of its
   * insert count that is never below the true count.
   */
  findCount<C>(this: SimpleBloomFilter<SpectralBloomSet<C>>, value: HashValue): C {
    const set = this.set
    const counts = Array.from(this.indices(value), (i) => set.queryCount(i))
    return counts.reduce((min, c) => (set.compareCounts(c, min) < 0 ? c : min))
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private indices(value: HashValue): Generator<number, void, undefined> {
    return hashIndices(this.hashProducers, this.set.size(), value)
  }

  private warnUnlessSameHashers(operation: string, other: BloomFilter): void {
    if (!sameHashers(this.hashProducers, other.hashers())) {
      logger.warn(
        `${operation}: filters do not share known-equivalent hash producers; the result may not represent either set`
      )
    }
  }
}

function checkHasherCount(n: number): void {
  if (!Number.isInteger(n) || n < 1) {
    throw new ContractViolationError(`A Bloom filter needs at least one hash producer, got ${n}`, ErrorCode.NO_HASHERS, {
      hashers: n,
    })
  }
}
