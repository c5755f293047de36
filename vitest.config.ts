import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['__tests__/**/*.test.ts'],
    globals: true,
    environment: 'node',
    pool: 'forks',
    watch: false,
    benchmark: {
      include: ['__bench__/**/*.bench.ts'],
    },
  },
});
