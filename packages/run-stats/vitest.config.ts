import { fileURLToPath } from 'node:url';
import { resolve } from 'node:path';
import { defineConfig } from 'vitest/config';

const here = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@symstats/run-stats-core': resolve(here, '../run-stats-core/src/index.ts'),
      '@symstats/run-stats-render': resolve(here, '../run-stats-render/src/index.ts'),
    },
  },
});
