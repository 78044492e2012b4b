import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'jsdom',
    // Include test files
    include: ['src/**/*.test.ts'],
  },
  // Tells Vitest to transform TypeScript for the same target tsc uses
  esbuild: {
    target: 'es2022',
  },
});
