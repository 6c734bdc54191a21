import os from 'os';
import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 10000,
    env: {
      HARBORGATE_HOME: path.join(os.tmpdir(), 'harborgate-vitest'),
      LOG_LEVEL: 'error',
      HARBORGATE_QUIET: '1',
    },
  },
});
