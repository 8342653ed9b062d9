import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

function source(pkg: string): string {
  return fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      // Workspace packages resolve to TypeScript source
      '@strata/service': source('service'),
      '@strata/layer': source('layer'),
      '@strata/telemetry': source('telemetry'),
      '@strata/timeout': source('timeout'),
      '@strata/limit': source('limit'),
      '@strata/load-shed': source('load-shed'),
      '@strata/buffer': source('buffer'),
      '@strata/retry': source('retry'),
      '@strata/util': source('util'),
      '@strata/mock': source('mock'),
      '@strata/core': source('core'),
    },
  },
  test: {
    root: '.',
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 10000,
    bail: process.env.CI ? 1 : 0,
  },
});
