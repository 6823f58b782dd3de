import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@dagwire/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      '@dagwire/serialization': fileURLToPath(
        new URL('./packages/serialization/src/index.ts', import.meta.url),
      ),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
  },
});
