/**
 * Filter Types
 *
 * Operations a Bloom filter offers, layered the same way as the storage
 * capabilities in `./set`. A filter implementation chooses which positions a
 * value touches; `SimpleBloomFilter` touches one position per hash producer,
 * while an optimisation such as minimal increase would implement these
 * interfaces with its own choice of counters.
 *
 * @module types/filter
 */

import type { BuildHasher, HashValue } from '../hash/hasher'
import type { BinaryBloomSet, BloomSet, DeletableBloomSet, SpectralBloomSet } from './set'

export interface BloomFilter<S extends BloomSet = BloomSet> {
  /** Underlying counters */
  counters(): S

  /** Hash producers, in index order */
  hashers(): readonly BuildHasher[]

  insert(value: HashValue): void

  /** False means definitely absent; true means possibly present */
  contains(value: HashValue): boolean

  clear(): void
}

export interface DeletableBloomFilter<S extends DeletableBloomSet = DeletableBloomSet>
  extends BloomFilter<S> {
  /**
   * Remove one insert of `value`. Removing a value that was never inserted
   * can cause false negatives for other values.
   */
  remove(value: HashValue): void
}

export interface BinaryBloomFilter<S extends BinaryBloomSet = BinaryBloomSet> extends BloomFilter<S> {
  /**
   * Add every value of `other`. Both filters must use equivalent hash
   * producers and the same number of counters.
   */
  union(other: BloomFilter<S>): void

  /** Keep only values also in `other`, under the same preconditions as `union` */
  intersect(other: BloomFilter<S>): void
}

export interface SpectralBloomFilter<C, S extends SpectralBloomSet<C> = SpectralBloomSet<C>>
  extends BloomFilter<S> {
  /** Whether `value` was probably inserted more than `count` times */
  containsMoreThan(value: HashValue, count: C): boolean

  /** Estimated insert count of `value`; never below the true count */
  findCount(value: HashValue): C
}
