/**
 * Storage Capability Types
 *
 * A filter decides which positions each value maps to; the storage behind it
 * decides what a counter at one position is. Storage declares what it can do
 * by the interfaces it implements:
 *
 * - BloomSet (required): increment, query, clear
 * - DeletableBloomSet: decrement, enabling `remove`
 * - SpectralBloomSet: raw counts, enabling `containsMoreThan` and `findCount`
 * - BinaryBloomSet: whole-storage union and intersection
 *
 * Every index argument must lie in `[0, size())`.
 *
 * @module types/set
 */

// =============================================================================
// Base Capability
// =============================================================================

/**
 * Storage that can back a Bloom filter.
 */
export interface BloomSet {
  /** Number of counters */
  size(): number

  /** Record one unit of presence at `index` */
  increment(index: number): void

  /** Reset every counter to its empty state */
  clear(): void

  /** Whether the counter at `index` indicates presence */
  query(index: number): boolean
}

/**
 * Builds a zero-initialized storage with `count` counters.
 */
export type BloomSetFactory<S extends BloomSet> = (count: number) => S

// =============================================================================
// Optional Capabilities
// =============================================================================

/**
 * Storage that tracks multiplicities and can therefore forget an insert.
 */
export interface DeletableBloomSet extends BloomSet {
  /** Remove one unit of presence at `index` */
  decrement(index: number): void
}

/**
 * Storage whose counters can be read as counts, for threshold lookups.
 */
export interface SpectralBloomSet<C> extends BloomSet {
  /** Raw counter value at `index` */
  queryCount(index: number): C

  /** Total order over counter values: negative, zero or positive */
  compareCounts(a: C, b: C): number
}

/**
 * Storage whose natural combination is per-position OR and AND.
 */
export interface BinaryBloomSet extends BloomSet {
  /** Insert every value present in `other` */
  union(other: this): void

  /** Keep only values also present in `other` */
  intersect(other: this): void
}

// =============================================================================
// Type Guards
// =============================================================================

export function isDeletable(set: BloomSet): set is DeletableBloomSet {
  return 'decrement' in set && typeof set.decrement === 'function'
}

export function isSpectral(set: BloomSet): set is SpectralBloomSet<unknown> {
  return (
    'queryCount' in set &&
    typeof set.queryCount === 'function' &&
    'compareCounts' in set &&
    typeof set.compareCounts === 'function'
  )
}

export function isBinary(set: BloomSet): set is BinaryBloomSet {
  return (
    'union' in set &&
    typeof set.union === 'function' &&
    'intersect' in set &&
    typeof set.intersect === 'function'
  )
}

// =============================================================================
// Capability Introspection
// =============================================================================

export interface SetCapabilities {
  /** `decrement` is available */
  delete: boolean
  /** `queryCount` is available */
  count: boolean
  /** `union` and `intersect` are available */
  combine: boolean
}

/**
 * Report which optional capabilities a storage instance supports.
 *
 * @example
 * ```typescript
 * const caps = getSetCapabilities(filter.counters())
 * if (caps.delete) {
 *   // filter.remove(...) is meaningful
 * }
 * ```
 */
export function getSetCapabilities(set: BloomSet): SetCapabilities {
  return {
    delete: isDeletable(set),
    count: isSpectral(set),
    combine: isBinary(set),
  }
}
