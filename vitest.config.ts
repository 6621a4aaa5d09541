import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const workspace = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@wisp/protocol': workspace('protocol'),
      '@wisp/utils': workspace('utils'),
      '@wisp/client': workspace('client'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov', 'html'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/*.test.ts', 'packages/*/src/__tests__/**'],
    },
  },
});
