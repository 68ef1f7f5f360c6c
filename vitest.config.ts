import path from 'node:path';
import { defineConfig } from 'vitest/config';

const repoRoot = __dirname;
const alias = {
  '@libs/http-client-core': path.resolve(repoRoot, 'libs/http-client-core/src/index.ts'),
  '@libs/regfeeds-client': path.resolve(repoRoot, 'libs/regfeeds-client/src/index.ts'),
  '@libs/regfeeds-data': path.resolve(repoRoot, 'libs/regfeeds-data/src/index.ts'),
  '@libs/regfeeds-query': path.resolve(repoRoot, 'libs/regfeeds-query/src/index.ts'),
};

export default defineConfig({
  test: {
    environment: 'node',
    include: ['libs/**/src/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
