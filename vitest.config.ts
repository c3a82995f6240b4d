import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      thresholds: {
        lines: 70,
        statements: 70,
        functions: 70,
        branches: 60,
      },
      exclude: [
        'node_modules/',
        'src/**/*.test.ts',
        'tests/**/*.ts',
        'src/shoebox-cli.ts',
      ]
    },
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
  },
});
