/**
 * generic-bloom
 *
 * Bloom filters generic over their storage. One filter implementation,
 * `SimpleBloomFilter`, backed by:
 * - `BitSet` gives a traditional binary Bloom filter with union/intersect
 * - `CountingBloomSet` gives a counting Bloom filter (with `remove`) that is
 *   also a spectral Bloom filter (with `findCount` and `containsMoreThan`)
 *
 * @example
 * ```typescript
 * import { SimpleBloomFilter, bitSet } from 'generic-bloom'
 *
 * const filter = SimpleBloomFilter.create(10, 20, bitSet)
 * filter.insert(48)
 * filter.insert(32)
 * filter.contains(48) // true
 * filter.contains(32) // true
 * ```
 *
 * @packageDocumentation
 */

export { SimpleBloomFilter } from './filter'

export * from './types'
export * from './storage'
export * from './hash'

export {
  BloomError,
  ConfigurationError,
  ContractViolationError,
  ErrorCode,
  IndexOutOfRangeError,
  isBloomError,
  isContractViolation,
} from './errors'
export type { SerializedError } from './errors'

export {
  contractChecksEnabled,
  filterOptionsSchema,
  resolveFilterOptions,
  setContractChecks,
} from './config'
export type { FilterOptions } from './config'

export { consoleLogger, createConsoleLogger, logger, noopLogger, setLogger } from './utils/logger'
export type { Logger } from './utils/logger'
