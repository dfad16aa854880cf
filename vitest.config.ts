import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/backend/src/**/*.test.ts', 'packages/prompts/test/**/*.spec.ts'],
    coverage: { reporter: ['text', 'html'] },
  },
  esbuild: { target: 'es2022' },
})
