import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  resolve: {
    alias: {
      '@shardkit/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
      '@shardkit/source-sequelize': fileURLToPath(new URL('../source-sequelize/src/index.ts', import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
