import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'node:url'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
      NODE_ENV: 'test',
    },
  },
  resolve: {
    alias: {
      '@waybill/domain': fileURLToPath(new URL('../domain/src/index.ts', import.meta.url)),
    },
  },
})
