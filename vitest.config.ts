import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@restplay/engine': fileURLToPath(new URL('./engine/src/index.ts', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['engine/src/**/*.test.ts', 'cli/src/**/*.test.ts'],
  },
});
