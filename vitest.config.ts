import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    setupFiles: ['packages/core/tests/helpers/setup.ts'],
    environment: 'node',
  },
})
