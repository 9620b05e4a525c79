import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const srcDir = fileURLToPath(new URL('./src/', import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@domain\/(.*)$/, replacement: `${srcDir}domain/$1` },
      { find: /^@\/(.*)$/, replacement: `${srcDir}$1` },
    ],
  },
  test: {
    environment: 'node',
    include: ['tests/**/*.{test,spec}.ts'],
    testTimeout: 20_000,
  },
});
