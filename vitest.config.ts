import { defineConfig } from 'vitest/config';

// Unit tests mock child processes; integration tests bind real loopback sockets
export default defineConfig(({ mode }) => {
  const isUnit = mode === 'unit' || process.env.VITEST_MODE === 'unit';
  const isIntegration = mode === 'integration' || process.env.VITEST_MODE === 'integration';

  const testInclude = isUnit
    ? ['src/test/unit/**/*.test.ts']
    : isIntegration
      ? ['src/test/integration/**/*.test.ts']
      : ['src/**/*.test.ts'];

  return {
    test: {
      globals: true,
      include: testInclude,
      setupFiles: ['./src/test/setup.ts'],
      environment: 'node',
      testTimeout: 10000, // 10s for tests
      hookTimeout: 10000, // 10s for setup/teardown
      reporters: ['default'],
      isolate: true,
      coverage: {
        provider: 'v8',
        reporter: ['text', 'json-summary', 'lcov'],
        exclude: ['node_modules/', 'src/test/', 'dist/', '*.config.ts', '**/*.test.ts'],
        include: ['src/**/*.ts'],
        reportsDirectory: './coverage',
      },
    },
  };
});
