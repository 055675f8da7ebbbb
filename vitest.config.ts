import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Sockets in the loopback tests bind real ports; keep files sequential
    pool: 'forks',
    poolOptions: {
      forks: {
        maxForks: 2,
        minForks: 1,
      },
    },
    fileParallelism: false,

    include: ['test/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/types/**',
        'src/index.ts', // Re-export only
        'src/testing/index.ts', // Re-export only
      ],
    },
  },
});
