import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/**',
        'dist/**',
        'tests/**',
        '*.config.ts'
      ]
    },
    testTimeout: 10000,
    hookTimeout: 10000,
    include: [
      'tests/**/*.test.ts'
    ],
    exclude: [
      'node_modules/**',
      'dist/**'
    ]
  }
});
