import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Use Node environment for testing CLI tools
    environment: 'node',

    // Global test setup
    setupFiles: ['./tests/setup.ts'],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      exclude: [
        'node_modules/**',
        'dist/**',
        'tests/**',
        '**/*.test.ts',
        '**/*.test.tsx',
        '**/__tests__/**',
        'vitest.config.ts',
        'src/index.tsx', // Main entry point - integration tested
        'src/wizard.tsx', // Wizard UI - integration tested
      ],
      thresholds: {
        lines: 85,
        functions: 85,
        branches: 80,
        statements: 85,
      },
    },

    // Test match patterns
    include: ['**/__tests__/**/*.test.{ts,tsx}', '**/*.test.{ts,tsx}'],
    exclude: ['node_modules', 'dist'],

    // Globals
    globals: true,

    // Test timeout
    testTimeout: 30000,

    // Mock reset
    clearMocks: true,
    restoreMocks: true,
  },
});
