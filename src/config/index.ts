/**
 * Configuration
 *
 * Two concerns live here:
 * - validating plain filter options (`{ hashers, counters }`) before a filter
 *   is built from them
 * - the contract-check switch that turns index range checks on storage
 *   operations on or off
 *
 * Contract checks default to on, except under `NODE_ENV=production` or when
 * `BLOOM_CONTRACT_CHECKS` is `0` or `false`.
 *
 * @module config
 */

import { z } from 'zod'
import { ConfigurationError } from '../errors'

// =============================================================================
// Filter Options
// =============================================================================

export const filterOptionsSchema = z.object({
  /** Number of hash producers (k) */
  hashers: z.number().int().min(1),
  /** Number of counters in the storage (m) */
  counters: z.number().int().min(1),
})

export type FilterOptions = z.infer<typeof filterOptionsSchema>

/**
 * Validate a filter options object.
 *
 * @throws ConfigurationError listing every failing field
 */
export function resolveFilterOptions(input: unknown): FilterOptions {
  const result = filterOptionsSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }))
    throw new ConfigurationError(
      `Invalid filter options: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
      { issues },
      result.error
    )
  }
  return result.data
}

// =============================================================================
// Contract Checks
// =============================================================================

function readContractChecksFromEnv(): boolean {
  const flag = process.env.BLOOM_CONTRACT_CHECKS
  if (flag !== undefined) {
    return !(flag === '0' || flag.toLowerCase() === 'false')
  }
  return process.env.NODE_ENV !== 'production'
}

let contractChecks = readContractChecksFromEnv()

export function contractChecksEnabled(): boolean {
  return contractChecks
}

/**
 * Enable or disable index range checks on storage operations.
 * Construction checks always run.
 */
export function setContractChecks(enabled: boolean): void {
  contractChecks = enabled
}
