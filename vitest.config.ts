/**
 * Vitest configuration
 *
 * Unit tests live under tests/unit and run in Node.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    setupFiles: ['tests/setup.ts'],
    sequence: {
      shuffle: false,
    },
    testTimeout: 30000,
  },
})
