import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['./tests/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'tests/',
        '*.config.ts',
        'src/**/*.d.ts',
        'src/main.ts',
      ],
    },
  },
  resolve: {
    alias: {
      '@': path.resolve(root, './src'),
      '@core': path.resolve(root, './src/core'),
      '@aircraft': path.resolve(root, './src/aircraft'),
      '@panels': path.resolve(root, './src/panels'),
      '@sim': path.resolve(root, './src/sim'),
      '@serial': path.resolve(root, './src/serial'),
      '@config': path.resolve(root, './src/config'),
      '@utils': path.resolve(root, './src/utils'),
    },
  },
});
