import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: [
        'src/index.ts',
        'src/adapters/index.ts',
        'src/gate/index.ts',
        'src/metrics/index.ts',
        'src/reporting/index.ts',
        'src/rules/index.ts',
        'src/scoring/index.ts',
        'src/serialization/index.ts',
        // needs the openai client
        'src/metrics/providers.ts',
      ],
      thresholds: {
        lines: 90,
        functions: 90,
        branches: 85,
        statements: 90,
      },
    },
  },
});
