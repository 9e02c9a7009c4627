import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: [
        'src/monitor/evaluate.ts',
        'src/monitor/state-machine.ts',
        'src/monitor/targets.ts',
        'src/reachability/classify.ts',
        'src/notify/template.ts',
      ],
    },
  },
});
