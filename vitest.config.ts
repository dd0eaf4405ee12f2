import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: [
        'src/application/window-aggregator.ts',
        'src/application/rule-engine.ts',
        'src/application/trigger-matcher.ts',
        'src/application/statistical-evaluator.ts',
        'src/application/event-intake.ts',
        'src/application/alert-dispatcher.ts',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },
  },
});
