import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    'epoch/index': 'src/epoch/index.ts',
    'messages/index': 'src/messages/index.ts',
    'transport/index': 'src/transport/index.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  splitting: false,
  sourcemap: true,
  clean: true,
  treeshake: true,
  minify: false,
  external: ['eventemitter3', 'zod'],
  outDir: 'dist',
  target: 'es2022',
});
