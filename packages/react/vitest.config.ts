import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    jsx: 'automatic',
  },
  test: {
    name: 'react',
    environment: 'jsdom',
    setupFiles: ['./test-setup.ts'],
  },
});
