import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    watch: false,
    isolate: true,
    testTimeout: 10000,
    clearMocks: true,
    reporters: ['default'],
  },
});
