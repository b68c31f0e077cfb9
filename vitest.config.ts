import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import path from 'path';

const projectRoot = path.dirname(fileURLToPath(new URL(import.meta.url)));
const resolveFromRoot = (p: string) => path.join(projectRoot, p);

export default defineConfig({
  test: {
    include: [
      'packages/**/tests/unit/**/*.test.ts',
      'packages/**/tests/integration/**/*.test.ts',
      'packages/**/tests/properties/**/*.property.ts',
    ],
    exclude: ['node_modules', 'dist', '**/node_modules/**', '**/dist/**'],
    environment: 'node',
    globals: true,
    clearMocks: true,
    setupFiles: ['tests/setup.ts'],
    testTimeout: 10000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov', 'html'],
      reportsDirectory: 'coverage',
      include: ['packages/**/src/**/*.ts'],
      exclude: ['packages/**/src/**/index.ts'],
    },
  },
  resolve: {
    alias: {
      '@ontocache/utils': resolveFromRoot('packages/utils/src/index.ts'),
      '@ontocache/core': resolveFromRoot('packages/core/src/index.ts'),
      '@ontocache/api-clients': resolveFromRoot('packages/api-clients/src/index.ts'),
      '@ontocache/storage': resolveFromRoot('packages/storage/src/index.ts'),
    },
  },
});
