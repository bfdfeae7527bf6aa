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
    globals: true,
    clearMocks: true,
    restoreMocks: true,
    setupFiles: ['tests/setup.ts'],
    testTimeout: 5000,
  },
  resolve: {
    alias: {
      '@predictkit/utils': resolveFromRoot('packages/utils/src/index.ts'),
      '@predictkit/formats': resolveFromRoot('packages/formats/src/index.ts'),
      '@predictkit/client': resolveFromRoot('packages/client/src/index.ts'),
    },
  },
});
