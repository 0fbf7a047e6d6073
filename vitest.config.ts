import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import path from 'path';

const projectRoot = path.dirname(fileURLToPath(new URL(import.meta.url)));
const resolveFromRoot = (p: string) => path.join(projectRoot, p);

export default defineConfig({
  test: {
    include: [
      'packages/**/tests/unit/**/*.test.ts',
      'packages/**/tests/properties/**/*.test.ts',
    ],
    exclude: ['node_modules', 'dist', '**/node_modules/**', '**/dist/**'],
    environment: 'node',
    globals: false,
    clearMocks: true,
    restoreMocks: true,
    setupFiles: ['tests/setup.ts'],
    testTimeout: 10000,
    env: {
      LOG_LEVEL: 'error',
      NODE_ENV: 'test',
    },
  },
  resolve: {
    alias: {
      '@loggather/utils': resolveFromRoot('packages/utils/src/index.ts'),
      '@loggather/core': resolveFromRoot('packages/core/src/index.ts'),
      '@loggather/storage': resolveFromRoot('packages/storage/src/index.ts'),
      '@loggather/workflows': resolveFromRoot('packages/workflows/src/index.ts'),
      '@loggather/cli': resolveFromRoot('packages/cli/src/index.ts'),
    },
  },
});
