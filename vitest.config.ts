import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  resolve: {
    alias: {
      '@svgview/types': path.resolve(__dirname, 'packages/types/src/index.ts'),
      '@svgview/core': path.resolve(__dirname, 'packages/core/src/index.ts'),
      '@svgview/render': path.resolve(__dirname, 'packages/render/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/*.test.ts', 'packages/*/src/**/index.ts'],
    },
  },
});
