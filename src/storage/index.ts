/**
 * Storage variants for SimpleBloomFilter
 *
 * @module storage
 */

export { BitSet, bitSet } from './bit-set'
export { CountingBloomSet, countingSet } from './counting-set'
export { u8, u16, u32, u64 } from './counters'
export type { CounterArray, CounterType } from './counters'
