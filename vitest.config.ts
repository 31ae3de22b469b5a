import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const resolveFromRoot = (relative: string): string =>
  fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/tests/**/*.{test,spec}.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 15000,
    setupFiles: ['./tests/setup.ts'],
  },
  resolve: {
    alias: {
      // Package aliases for tests
      '@procward/core': resolveFromRoot('./packages/procward-core/src/index.ts'),
      '@procward/node': resolveFromRoot('./packages/procward-node/src/index.ts'),
    },
  },
});
