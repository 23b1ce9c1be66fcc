import { resolve } from 'node:path'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'scripts/**/*.test.ts'],
    testTimeout: 20000,
  },
  resolve: {
    alias: [
      {
        find: /^@binfetch\/core$/,
        replacement: resolve('packages/core/src/index.ts'),
      },
      {
        find: /^@binfetch\/core\/test-utils$/,
        replacement: resolve('packages/core/src/test-utils.ts'),
      },
    ],
  },
})
