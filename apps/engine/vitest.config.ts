import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: [
        'src/analytics/latency.ts',
        'src/analytics/summary.ts',
        'src/analytics/uptime.ts',
        'src/monitor/pending.ts',
        'src/monitor/targets.ts',
        'src/monitor/payload.ts',
        'src/notify/transitions.ts',
        'src/scheduler/plan.ts',
      ],
      thresholds: {
        lines: 90,
        functions: 90,
        statements: 90,
        branches: 85,
      },
    },
  },
});
