import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (path: string) => fileURLToPath(new URL(`./packages/${path}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@lakeshift\/core\/test$/, replacement: pkg('core/src/test.ts') },
      { find: /^@lakeshift\/core$/, replacement: pkg('core/src/index.ts') },
      { find: /^@lakeshift\/databricks\/test$/, replacement: pkg('databricks/src/test.ts') },
      { find: /^@lakeshift\/databricks$/, replacement: pkg('databricks/src/index.ts') },
    ],
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/test/**/*.test.ts', 'packages/*/test/**/*.test.ts'],
  },
});
