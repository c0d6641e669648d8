import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Resource limits
    pool: 'forks',
    poolOptions: {
      forks: {
        maxForks: 2,
        minForks: 1,
      },
    },

    include: ['test/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/index.ts', // Re-export only
        'src/types/index.ts', // Type definitions only
      ],
      all: true,
    },
  },
});
