import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['*.test.ts', '*.test.tsx', 'services/**/*.test.ts'],
    environment: 'node',
    env: {
      JOB_ASSISTANT_LOG_LEVEL: 'silent',
    },
  },
});
