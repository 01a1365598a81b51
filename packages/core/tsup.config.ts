import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
  },
  format: ['cjs', 'esm'],
  dts: {
    compilerOptions: {
      composite: false,
    },
  },
  external: ['@sampleformat/utils'],
  sourcemap: true,
  clean: true,
  target: 'es2020',
});
