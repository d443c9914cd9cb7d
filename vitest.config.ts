import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const rootDir = fileURLToPath(new URL('.', import.meta.url));
const coreSourceDir = resolve(rootDir, 'packages/core/src');

export default defineConfig({
  resolve: {
    alias: [
      {
        find: /^@fieldcheck\/core$/,
        replacement: resolve(coreSourceDir, 'index.ts'),
      },
    ],
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/test/**/*.test.ts', 'apps/**/test/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      reportsDirectory: './coverage',
      exclude: ['**/dist/**', '**/test/**', '**/*.test.ts'],
    },
  },
});
