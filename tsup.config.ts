// tsup.config.ts
import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  outDir: 'dist',

  // Emit both ESM and CJS to satisfy "module" and "main"
  format: ['esm', 'cjs'],
  target: 'es2022',

  bundle: true,
  splitting: false,
  skipNodeModulesBundle: true,
  // chalk 5 ships ESM only; the CJS build must not `require` it
  noExternal: ['chalk'],

  dts: false, // declarations come from `tsc -p tsconfig.build.json`
  sourcemap: true,
  clean: true,
  minify: false,
  treeshake: true,
  shims: false,

  // Make CJS end in .cjs and ESM in .js
  outExtension({ format }) {
    return { js: format === 'cjs' ? '.cjs' : '.js' };
  },

  tsconfig: 'tsconfig.build.json',
});
