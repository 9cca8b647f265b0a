import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const root = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@kra-decoder/types': root('./packages/types/src/index.ts'),
      '@kra-decoder/adapter-kra': root('./packages/adapter-kra/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/*.test.ts', 'packages/*/src/**/index.ts', 'packages/*/src/test-helpers.ts'],
    },
  },
});
