import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['__tests__/spec/**/*.spec.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      NODE_ENV: 'test',
    },
  },
})
