import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const src = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@rwkit\/bsf\/test-helpers$/, replacement: src('./packages/bsf/src/test-helpers.ts') },
      { find: /^@rwkit\/bsf$/, replacement: src('./packages/bsf/src/index.ts') },
      { find: /^@rwkit\/renderer$/, replacement: src('./packages/renderer/src/index.ts') },
    ],
  },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts', 'tools/*/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts', 'tools/*/src/**/*.ts'],
      exclude: ['**/*.test.ts', '**/index.ts', '**/cli.ts', '**/test-helpers.ts'],
    },
  },
});
