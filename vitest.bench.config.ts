import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/bench/**/*.bench.ts'],
    pool: 'forks',
  },
});
