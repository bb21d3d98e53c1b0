import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@saml-sts/assertion-sdk': fileURLToPath(
        new URL('./packages/assertion-sdk/src/index.ts', import.meta.url)
      ),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    environment: 'node',
  },
});
