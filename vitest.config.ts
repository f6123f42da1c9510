import { defineConfig } from 'vitest/config';
import swc from 'unplugin-swc';
import path from 'path';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.spec.ts', 'src/**/*.integration-spec.ts'],
    setupFiles: ['./src/test/setup.ts'],
  },
  plugins: [
    // esbuild drops decorator metadata; Nest needs it for DI in module tests
    swc.vite({ module: { type: 'es6' } }),
  ],
  resolve: {
    alias: {
      '@': path.resolve(__dirname, './src'),
    },
  },
});
