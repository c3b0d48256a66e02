import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { defineConfig } from 'vitest/config';

// force vitest to use CI mode to avoid watch mode
process.env.CI = 'true';

export default defineConfig({
  // workspace packages export their sources under this condition
  resolve: {
    conditions: ['development'],
  },
  ssr: {
    resolve: {
      conditions: ['development'],
    },
  },
  test: {
    globals: true,
    environment: 'node',
    pool: 'forks',
    include: ['packages/**/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      // error events are always written; keep them out of the user's home
      KVCTL_LOG_DIR: join(tmpdir(), 'kvctl-test-logs'),
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
