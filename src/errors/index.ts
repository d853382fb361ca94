/**
 * Error Handling Module
 *
 * The library has almost nothing that can fail at runtime. Errors fall into
 * two groups:
 * - ContractViolationError: caller misuse (no hash producers, an index past
 *   the end of the storage, combining filters of different sizes)
 * - ConfigurationError: a plain options object that does not validate
 *
 * False positives from `contains` and over-counts from `findCount` are the
 * expected behaviour of the structure and are never reported as errors.
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Stable error codes for programmatic handling.
 */
export enum ErrorCode {
  UNKNOWN = 'UNKNOWN',

  // Contract violations
  CONTRACT_VIOLATION = 'CONTRACT_VIOLATION',
  NO_HASHERS = 'NO_HASHERS',
  EMPTY_STORAGE = 'EMPTY_STORAGE',
  INDEX_OUT_OF_RANGE = 'INDEX_OUT_OF_RANGE',
  SIZE_MISMATCH = 'SIZE_MISMATCH',

  // Configuration
  INVALID_CONFIG = 'INVALID_CONFIG',
}

// =============================================================================
// Serialized Error Format
// =============================================================================

export interface SerializedError {
  name: string
  code: ErrorCode
  message: string
  stack?: string
  context?: Record<string, unknown>
  cause?: SerializedError
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base class for every error thrown by the library.
 *
 * @example
 * ```typescript
 * throw new BloomError('Filter rejected input', ErrorCode.UNKNOWN, { size: 20 })
 * ```
 */
export class BloomError extends Error {
  override readonly name: string = 'BloomError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stack: process.env.NODE_ENV !== 'production' ? this.stack : undefined,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof BloomError ? this.cause.toJSON() : undefined,
    }
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }
}

// =============================================================================
// Contract Violations
// =============================================================================

/**
 * A precondition of the API was broken by the caller. These are programming
 * errors; nothing in the library catches them.
 */
export class ContractViolationError extends BloomError {
  override readonly name: string = 'ContractViolationError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONTRACT_VIOLATION,
    context?: Record<string, unknown>
  ) {
    super(message, code, context)
    Object.setPrototypeOf(this, ContractViolationError.prototype)
  }
}

/**
 * Thrown when an index falls outside `[0, size)`.
 */
export class IndexOutOfRangeError extends ContractViolationError {
  override readonly name = 'IndexOutOfRangeError'

  constructor(index: number, size: number) {
    super(`Index ${index} out of range for storage of size ${size}`, ErrorCode.INDEX_OUT_OF_RANGE, {
      index,
      size,
    })
    Object.setPrototypeOf(this, IndexOutOfRangeError.prototype)
  }

  get index(): number {
    return typeof this.context.index === 'number' ? this.context.index : -1
  }

  get size(): number {
    return typeof this.context.size === 'number' ? this.context.size : -1
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Thrown when filter options fail validation.
 */
export class ConfigurationError extends BloomError {
  override readonly name = 'ConfigurationError'

  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCode.INVALID_CONFIG, context, cause)
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isBloomError(error: unknown): error is BloomError {
  return error instanceof BloomError
}

export function isContractViolation(error: unknown): error is ContractViolationError {
  return error instanceof ContractViolationError
}
