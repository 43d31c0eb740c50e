import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    // Main entry point (Result algebra, errors, combinators, retry)
    index: 'src/index.ts',

    // Test helpers
    testing: 'src/testing-entry.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: true,
});
