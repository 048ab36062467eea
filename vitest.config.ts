import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    globals: true,
    testTimeout: 30000,
    env: {
      LOG_LEVEL: 'silent',
    },
  },
  resolve: {
    alias: {
      '@founder-finder/agents': fromRoot('./agents/src/index.ts'),
      '@founder-finder/core': fromRoot('./packages/core/src/index.ts'),
      '@founder-finder/llm': fromRoot('./packages/llm/src/index.ts'),
      '@founder-finder/schemas': fromRoot('./packages/schemas/src/index.ts'),
    },
  },
});
