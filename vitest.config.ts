import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
  // Catalog specs write snapshots under tmp/; keep them in one worker so directories never race.
  pool: 'forks',
  maxWorkers: 1,
  minWorkers: 1,
  include: ['src/tests/**/*.spec.ts'],
  testTimeout: 15000,
    exclude: [
      'dist/**',
      'node_modules/**'
    ],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'lcov', 'cobertura'],
      reportsDirectory: 'coverage',
      // Scope coverage to the library itself; test helpers are not product code.
      include: [
        'src/services/**',
        'src/models/**',
        'src/config/**',
        'src/utils/**'
      ],
      exclude: [
        'dist/**',
        'src/tests/**',
        '**/*.d.ts'
      ]
    }
  }
});
