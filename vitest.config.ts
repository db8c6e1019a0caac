import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// Workspace packages export built files to Node; tests run against their sources.
const source = (pkg: string, entry: string) => fileURLToPath(new URL(`./packages/${pkg}/src/${entry}.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@erratum/core': source('core', 'index'),
      '@erratum/tools': source('tools', 'index'),
      '@erratum/cli': source('cli', 'program'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
  },
});
