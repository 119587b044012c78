import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (relativePath: string): string => fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@race\/domain$/, replacement: fromRoot('./packages/domain/src/index.ts') },
      { find: /^@race\/config$/, replacement: fromRoot('./packages/config/src/index.ts') },
      { find: /^@race\/bench\/(.*)$/, replacement: `${fromRoot('./apps/bench/src')}/$1` },
    ],
  },
  test: {
    include: ['packages/*/src/**/__tests__/**/*.test.ts', 'apps/*/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'fatal',
    },
  },
});
