import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./tests/setup.ts'], // Restores HARNESS_* variables around each test
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        '**/index.ts',
        'src/cli.ts',
        'vitest.config.ts',
        'tests/**/*'
      ]
    },
    include: [
      'src/**/*.test.ts',
      'tests/**/*.test.ts'
    ],
    exclude: [
      'node_modules',
      'dist',
      '.git'
    ],
    // Tests mutate process.env and spy on process streams
    sequence: {
      concurrent: false,
      shuffle: false
    }
  }
});
