import { contractChecksEnabled } from '../config'
import { IndexOutOfRangeError } from '../errors'

/**
 * Range check for storage indices, skipped when contract checks are off.
 */
export function checkIndex(index: number, size: number): void {
  if (contractChecksEnabled() && !(Number.isInteger(index) && index >= 0 && index < size)) {
    throw new IndexOutOfRangeError(index, size)
  }
}
