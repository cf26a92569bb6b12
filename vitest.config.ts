import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'json'],
      exclude: ['node_modules/', 'dist/', 'logs/', 'templates/', '*.config.*', 'coverage/'],
    },
    testTimeout: 20000,
    hookTimeout: 20000,
  },
})
