import { defineConfig } from 'vitest/config'

/**
 * Default vitest configuration
 *
 * Unit tests run in plain Node.js. Nothing here talks to a network:
 * the HTTP transport is exercised through an injected fetch and the
 * engine through an in-process fake transport.
 */
export default defineConfig({
  test: {
    include: ['tests/unit/**/*.test.ts'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/cli/main.ts'],
    },
  },
})
