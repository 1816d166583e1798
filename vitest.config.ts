import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*_test.ts'],
    // Keep test runs from writing log files
    env: {
      PANETEXT_LOG_FILE: '',
    },
  },
});
