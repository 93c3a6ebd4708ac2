import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const alias = {
  '@libs/datastream-client': fileURLToPath(
    new URL('./libs/datastream-client/src/index.ts', import.meta.url),
  ),
};

export default defineConfig({
  test: {
    environment: 'node',
    include: ['libs/*/src/**/__tests__/**/*.test.ts', 'apps/*/src/**/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
