import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // One project per workspace package
    projects: ['packages/@mlenv/*/vitest.config.ts'],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/*.config.{ts,js}',
        '**/*.d.ts',
        '**/test/**',
        '**/__tests__/**',
      ],
    },
  },
})
