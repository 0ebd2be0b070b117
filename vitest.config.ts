import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import path from 'node:path';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@ace/core': path.resolve(root, 'packages/core/src'),
      '@ace/playbook': path.resolve(root, 'packages/playbook/src'),
      '@ace/models': path.resolve(root, 'packages/models/src'),
      '@ace/roles': path.resolve(root, 'packages/roles/src'),
      '@ace/adaptation': path.resolve(root, 'packages/adaptation/src'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', 'test/', '**/*.test.ts', '**/*.d.ts'],
    },
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
