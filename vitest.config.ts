import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

process.env.LOG_LEVEL ??= 'silent';

export default defineConfig({
  resolve: {
    alias: {
      '@mintable/types': fileURLToPath(new URL('./packages/types/src/index.ts', import.meta.url)),
      '@mintable/observability': fileURLToPath(
        new URL('./packages/observability/src/index.ts', import.meta.url)
      ),
      '@mintable/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
