import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*_test.ts'],
    exclude: ['tests/**/testhelper.ts'],
    hookTimeout: 30000,
  },
})
