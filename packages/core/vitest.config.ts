import { defineConfig } from 'vitest/config';

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    name: 'core',
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts', 'test/**/*.spec.ts'],
    // Extended timeouts for property-based testing
    testTimeout: isCI ? 30000 : 10000,
    retry: 0,
    env: {
      TEST_SEED: '424242',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.test.ts', 'src/**/__tests__/**'],
    },
  },
});
