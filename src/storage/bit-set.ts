/**
 * Presence-bit storage for binary Bloom filters.
 *
 * Bits are packed eight to a byte, least significant bit first. A bit can be
 * set but never unset individually, so this storage offers no `decrement`.
 */

import { contractChecksEnabled } from '../config'
import { ContractViolationError, ErrorCode } from '../errors'
import type { BinaryBloomSet, BloomSetFactory } from '../types/set'
import { checkIndex } from './check'

export class BitSet implements BinaryBloomSet {
  private readonly bits: Uint8Array
  private readonly numBits: number

  constructor(numBits: number) {
    this.numBits = numBits
    this.bits = new Uint8Array(Math.ceil(numBits / 8))
  }

  size(): number {
    return this.numBits
  }

  increment(index: number): void {
    checkIndex(index, this.numBits)
    this.bits[index >>> 3]! |= 1 << (index & 7)
  }

  clear(): void {
    this.bits.fill(0)
  }

  query(index: number): boolean {
    checkIndex(index, this.numBits)
    return ((this.bits[index >>> 3] ?? 0) & (1 << (index & 7))) !== 0
  }

  union(other: BitSet): void {
    this.checkSameSize(other)
    for (let i = 0; i < this.bits.length; i++) {
      this.bits[i]! |= other.bits[i] ?? 0
    }
  }

  intersect(other: BitSet): void {
    this.checkSameSize(other)
    for (let i = 0; i < this.bits.length; i++) {
      this.bits[i]! &= other.bits[i] ?? 0
    }
  }

  /**
   * Number of set bits
   */
  popcount(): number {
    let count = 0
    for (const byte of this.bits) {
      let b = byte
      while (b) {
        b &= b - 1
        count++
      }
    }
    return count
  }

  clone(): BitSet {
    const copy = new BitSet(this.numBits)
    copy.bits.set(this.bits)
    return copy
  }

  equals(other: BitSet): boolean {
    if (other.numBits !== this.numBits) return false
    return this.bits.every((byte, i) => byte === other.bits[i])
  }

  private checkSameSize(other: BitSet): void {
    if (contractChecksEnabled() && other.numBits !== this.numBits) {
      throw new ContractViolationError(
        `Cannot combine bit sets of different sizes (${this.numBits} and ${other.numBits})`,
        ErrorCode.SIZE_MISMATCH,
        { size: this.numBits, otherSize: other.numBits }
      )
    }
  }
}

export const bitSet: BloomSetFactory<BitSet> = (count) => new BitSet(count)
