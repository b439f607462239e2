import dts from 'vite-plugin-dts';
import { defineConfig } from 'vite';

export default defineConfig({
  plugins: [
    dts({
      entryRoot: 'src',
      outDir: 'dist',
      exclude: ['./tests/**/*.ts', './examples/**/*.ts'],
      include: ['./src/**/*.ts'],
    }),
  ],
  build: {
    target: 'node20',
    outDir: 'dist',
    lib: {
      entry: {
        index: './src/index.ts',
        cli: './src/cli.ts',
      },
      formats: ['es'],
    },
    rollupOptions: {
      external: [
        '@fjell/logging',
        'fast-safe-stringify',
        /^node:/,
      ],
      output: {
        entryFileNames: '[name].js',
        banner: (chunk) => (chunk.name === 'cli' ? '#!/usr/bin/env node' : ''),
        exports: 'named',
      },
    },
    minify: false,
    sourcemap: true
  },
});
