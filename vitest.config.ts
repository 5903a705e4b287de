import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    // Keep the file logger out of the user's real data directory
    env: {
      CASEFILE_DATA_DIR: join(tmpdir(), `casefile-vitest-${process.pid}`),
    },
  },
});
