import { defineConfig } from 'vitest/config';
import { resolve } from 'path';
import { fileURLToPath } from 'url';

const rootDir = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',

    // Test file patterns
    include: ['packages/**/tests/**/*.{test,spec}.ts'],

    // Exclude patterns
    exclude: ['**/node_modules/**', '**/dist/**'],

    // Test setup
    setupFiles: ['./test-setup.ts'],
  },

  // Resolve configuration for monorepo
  resolve: {
    alias: {
      '@replyguard/shared': resolve(rootDir, 'packages/shared/src/index.ts'),
      '@replyguard/message-guard': resolve(rootDir, 'packages/message-guard/src/index.ts'),
    },
  },
});
