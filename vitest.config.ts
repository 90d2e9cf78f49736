import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['packages/**/*.test.ts'],
    // inversify reads class metadata through the Reflect polyfill
    setupFiles: ['./vitest.setup.ts'],
  },
});
