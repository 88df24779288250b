import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const source = (path: string): string => fileURLToPath(new URL(path, import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@shipline/core': source('./packages/shipline-core/src/index.ts'),
      '@shipline/cli': source('./packages/shipline-cli/src/index.ts'),
      '@shipline/delivery': source('./packages/shipline-delivery/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
  },
})
