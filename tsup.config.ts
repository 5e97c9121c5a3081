import { defineConfig } from 'tsup';

export default defineConfig([
  {
    entry: ['src/index.ts'],
    outDir: 'dist',
    format: ['cjs'],
    dts: true,
    sourcemap: true,
    clean: true,
  },
  {
    entry: ['src/cli.ts'],
    outDir: 'dist',
    format: ['cjs'],
    sourcemap: true,
    clean: false, // keep the library entry emitted above
    banner: {
      js: '#!/usr/bin/env node',
    },
  },
]);
