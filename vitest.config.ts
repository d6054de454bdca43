import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['apps/*/src/**/__tests__/**/*.{test,spec}.ts', 'packages/*/src/**/__tests__/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Some tests write output files under the OS temp dir
    testTimeout: 10000,
  },
})
