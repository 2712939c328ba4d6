import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['core/**/*.test.ts', 'archive/**/*.test.ts', 'storage/**/*.test.ts', 'cli/**/*.test.ts'],
    exclude: ['**/node_modules/**', 'dist/**'],
    env: {
      NODE_ENV: 'test',
    },
  },
})
