import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/__tests__/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**'],
      thresholds: {
        lines: 50,
        statements: 50,
        branches: 45,
        functions: 50,
      },
      reportsDirectory: './coverage',
    },
  },
})
