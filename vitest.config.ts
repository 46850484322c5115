import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const source = (file: string) => fileURLToPath(new URL(file, import.meta.url));

export default defineConfig({
  resolve: {
    // workspace packages run from their TypeScript sources, not from dist
    alias: {
      '@attendance-monitor/utils': source('./utils/src/index.ts'),
      '@attendance-monitor/sdk': source('./sdk/src/index.ts'),
      '@attendance-monitor/cli': source('./cli/src/program.ts'),
    },
  },
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10_000,
    env: {
      LOG_LEVEL: 'error',
    },
  },
});
