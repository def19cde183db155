import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const workspaceSource = (path: string): string => fileURLToPath(new URL(path, import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@cratedigger/logger': workspaceSource('./packages/logger/src/index.ts'),
      '@cratedigger/site-registry': workspaceSource('./packages/site-registry/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['apps/*/src/**/*.{test,spec}.ts', 'packages/*/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    setupFiles: ['apps/crawler/src/test-no-network.setup.ts'],
    testTimeout: 15000,
    env: { LOG_LEVEL: 'error', LOG_FILE: '' },
  },
})
