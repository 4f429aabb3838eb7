import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'unit',
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    // Keep engine debug/warn lines out of the test output.
    env: { LOG_LEVEL: 'error' },
  },
})
