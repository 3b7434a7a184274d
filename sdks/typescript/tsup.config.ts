import { defineConfig } from 'tsup';

// The workspace exports src/ directly; this bundle is the publishable form.
export default defineConfig({
  entry: ['src/index.ts'],
  outDir: 'dist',
  tsconfig: '../../tsconfig.build.json',
  target: 'node20',
  format: ['esm', 'cjs'],
  dts: true,
  sourcemap: true,
  clean: true,
});
