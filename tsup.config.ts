import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/main/main.ts'],
  outDir: 'dist/main',
  format: ['cjs'],
  platform: 'node',
  target: 'node20',
  sourcemap: true,
  clean: true,
  splitting: false
});
