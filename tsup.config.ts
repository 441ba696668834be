import { defineConfig } from 'tsup';

export default defineConfig({
  entry: { cli: 'packages/app/src/main/cli.ts' },
  format: ['cjs'],
  platform: 'node',
  target: 'node20',
  outDir: 'dist',
  clean: true,
  // Workspace packages point at their TypeScript sources, so they are bundled in.
  noExternal: [/^@svgview\//],
  external: ['@resvg/resvg-js', 'chokidar', 'fflate', 'zustand'],
  banner: {
    js: '#!/usr/bin/env node',
  },
});
