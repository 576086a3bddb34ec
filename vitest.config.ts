import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const packageEntry = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '*.config.ts', 'packages/*/bin/**'],
    },
  },
  resolve: {
    alias: {
      '@devsim/logger': packageEntry('logger'),
      '@devsim/mock-device': packageEntry('mock-device'),
    },
  },
});
