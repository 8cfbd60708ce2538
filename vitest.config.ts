import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./node/src', import.meta.url)),
    },
  },
  test: {
    include: ['node/tests/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_TYPE: 'hidden',
    },
  },
});
