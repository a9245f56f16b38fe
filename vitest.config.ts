import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node', // Default to node (faster, no DOM overhead)
    include: ['tests/**/*.test.ts'],
    // Cookie-backed token tests read document.cookie
    environmentMatchGlobs: [
      ['**/AuthTokenProvider.test.ts', 'happy-dom'],
    ],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        'tests/',
        '*.config.ts'
      ]
    }
  },
});
