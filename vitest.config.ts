import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

function source(pkg: string): string {
  return fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      '@hostpulse/shared': source('shared'),
      '@hostpulse/collector': source('collector'),
      '@hostpulse/ingestion': source('ingestion'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
    },
    testTimeout: 10_000,
  },
});
