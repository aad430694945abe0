import { defineConfig } from 'vitest/config';
import os from 'os';
import path from 'path';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      // keep config and log files of test runs out of the user's home
      GAMEPLAY_RECORDER_HOME: path.join(os.tmpdir(), `gameplay-recorder-test-${process.pid}`)
    },
    testTimeout: 20000,
    reporters: ['default']
  }
});
