import { defineConfig } from 'vite';
import { resolve } from 'path';
import dts from 'vite-plugin-dts';

export default defineConfig({
  build: {
    target: 'node20',
    lib: {
      entry: resolve(__dirname, 'src/index.ts'),
      name: 'WaterfallTimings',
      fileName: (format) => `waterfall-timings.${format}.js`,
      formats: ['es', 'cjs'],
    },
    rollupOptions: {
      // Node built-ins stay imports
      external: [/^node:/],
      output: {},
    },
  },
  plugins: [
    dts({ insertTypesEntry: true, include: ['src'] }),
  ],
});
