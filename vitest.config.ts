import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    // PGLite boots a fresh WASM Postgres per suite
    testTimeout: 60000,
    hookTimeout: 60000,
  },
  resolve: {
    extensions: ['.js', '.ts', '.mjs', '.mts', '.json'],
  },
})
