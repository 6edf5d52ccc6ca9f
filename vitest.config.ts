import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['test/**/*.test.ts'],
    // worker threads boot the TypeScript entry through tsx
    testTimeout: 20_000,
    hookTimeout: 20_000,
  },
});
