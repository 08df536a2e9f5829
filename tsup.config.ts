import { defineConfig } from 'tsup';

// src/cli.ts carries its own shebang, which esbuild keeps on the CLI bundle only.
export default defineConfig({
  entry: ['src/cli.ts', 'src/index.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
  dts: true,
  sourcemap: true,
});
