import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  resolve: {
    alias: {
      // Workspace packages resolve to their sources
      '@strata/config': fileURLToPath(new URL('./packages/config/src/index.ts', import.meta.url)),
      '@strata/http-config': fileURLToPath(new URL('./packages/http-config/src/index.ts', import.meta.url)),
    },
  },
  test: {
    root: '.',
    exclude: ['**/node_modules/**', '**/dist/**'],
    include: ['packages/*/tests/**/*.test.ts'],
    testTimeout: 10000,
    server: {
      deps: {
        // clipanion's ESM build uses a directory import Node cannot resolve
        inline: ['clipanion'],
      },
    },
  },
});
