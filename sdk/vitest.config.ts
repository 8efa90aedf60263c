import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Include all test files
    include: ['test/**/*.test.ts'],

    // Test isolation
    isolate: true,

    // Timeouts
    testTimeout: 10000,
    hookTimeout: 10000,

    coverage: {
      provider: 'v8',
      reporter: ['text'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts']
    }
  }
})
