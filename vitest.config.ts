import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { defineConfig } from 'vitest/config';
import react from '@vitejs/plugin-react';

export default defineConfig({
  plugins: [react()],
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.{ts,tsx}'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'json', 'lcov'],
      include: ['src/**/*.{ts,tsx}'],
      exclude: ['src/**/*.d.ts', 'src/cli.ts'],
    },
    env: {
      // Keep log files out of the working tree during test runs
      PYLAUNCH_LOG_DIR: join(tmpdir(), 'pylaunch-test-logs'),
      LOG_LEVEL: 'silent',
      // Render Ink as in an interactive terminal even when the host sets CI
      CI: 'false',
    },
    testTimeout: 30000,
    hookTimeout: 10000,
    setupFiles: ['tests/setup.ts'],
    retry: process.env.CI ? 2 : 0,
  },
});
