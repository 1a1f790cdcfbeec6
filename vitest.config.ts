import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    exclude: [
      'node_modules',
      'forge_output',
      'dist',
    ],
    include: ['test/**/*.test.ts'],
    testTimeout: 15_000,
  },
});
