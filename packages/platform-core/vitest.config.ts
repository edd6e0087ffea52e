import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    name: 'platform-core',
    globals: true,
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
  resolve: {
    alias: {
      '@biblioteca/shared-contracts': fileURLToPath(new URL('../shared/contracts/src/index.ts', import.meta.url)),
    },
  },
});
