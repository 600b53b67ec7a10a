import { defineConfig } from 'tsup';

export default defineConfig({
  format: ['esm'],
  target: 'node20',
  platform: 'node',
  splitting: false,
  clean: true,
  sourcemap: true,
  entry: {
    cli: 'src/cli/index.ts',
  },
  outDir: 'dist',
});
