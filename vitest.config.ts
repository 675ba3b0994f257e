import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const packageEntry = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@schemabridge/core': packageEntry('core'),
      '@schemabridge/mapping': packageEntry('mapping'),
      '@schemabridge/connector-db': packageEntry('connector-db'),
      '@schemabridge/connector-api': packageEntry('connector-api'),
      '@schemabridge/cli': packageEntry('cli'),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
  },
});
