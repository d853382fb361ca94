/**
 * Logger tests
 */

import { afterEach, describe, it, expect, vi } from 'vitest'
import { consoleLogger, createConsoleLogger, logger, noopLogger, setLogger } from '../../src/utils/logger'

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should tag lines with the prefix and level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    createConsoleLogger('test').warn('careful', 42)
    expect(warn).toHaveBeenCalledWith('[test] [WARN] careful', 42)
  })

  it('should pass an error through only when given', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    const cause = new Error('cause')
    consoleLogger.error('failed', cause)
    consoleLogger.error('failed again')
    expect(error).toHaveBeenNthCalledWith(1, '[bloom] [ERROR] failed', cause)
    expect(error).toHaveBeenNthCalledWith(2, '[bloom] [ERROR] failed again')
  })
})

describe('setLogger', () => {
  it('should start silent', () => {
    expect(logger).toBe(noopLogger)
  })

  it('should replace the shared logger', () => {
    setLogger(consoleLogger)
    expect(logger).toBe(consoleLogger)
  })
})
