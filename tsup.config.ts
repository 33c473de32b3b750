import { defineConfig } from 'tsup';

// Runtime dependencies stay external; everything under the path aliases is bundled
const externalDependencies = ['chalk', 'winston'];

export default defineConfig([
  // API build
  {
    entry: {
      index: 'api/index.ts'
    },
    format: ['esm', 'cjs'],
    dts: false,
    clean: true,
    sourcemap: true,
    platform: 'node',
    target: 'node20',
    outDir: 'dist',
    outExtension({ format }) {
      return {
        js: format === 'cjs' ? '.cjs' : '.mjs'
      };
    },
    external: externalDependencies
  },
  // CLI build
  {
    entry: {
      cli: 'bin/texast.ts'
    },
    format: 'cjs',
    dts: false,
    clean: false,
    sourcemap: true,
    platform: 'node',
    target: 'node20',
    outDir: 'dist',
    outExtension() {
      return {
        js: '.cjs'
      };
    },
    external: externalDependencies
  }
]);
