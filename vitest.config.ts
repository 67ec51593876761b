import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    // fast-check run count and seed come from FUZZ_* env vars
    setupFiles: ['./tests/fuzz/setup.ts'],
    watch: false,
    testTimeout: 20000,
    hookTimeout: 10000,
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
  },
})
