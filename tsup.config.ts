import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['cjs'],
  clean: true,
  sourcemap: true,
  target: 'node20',
  outDir: 'dist',
  splitting: false,
  external: [
    // Dependencies stay external for the CLI
    'chalk',
    'commander',
    'zod'
  ]
});
