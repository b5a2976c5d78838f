import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@strata/core': pkg('core'),
      '@strata/engine': pkg('engine'),
      '@strata/runtime': pkg('runtime'),
      '@strata/adapters': pkg('adapters'),
      '@strata/testing': pkg('testing')
    }
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node'
  }
});
