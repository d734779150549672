/// <reference types="vitest/config" />
import { defineConfig } from 'vitest/config'
import tsconfigPaths from 'vite-tsconfig-paths'

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    globals: true,
    environment: 'node',
    include: [
      'packages/*/src/**/__tests__/**/*.test.ts',
      'apps/*/src/**/__tests__/**/*.test.ts',
      'apps/*/src/**/*.test.ts'
    ],
    setupFiles: ['apps/pipeline/test/setup.ts'],
    env: {
      RNAFLOW_LOGS: '/tmp/rnaflow-logs-test',
      RNAFLOW_TIMEZONE: 'UTC',
      LOG_LEVEL: 'info'
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      exclude: ['node_modules/', 'build/', 'dist/', '**/*.d.ts']
    }
  }
})
