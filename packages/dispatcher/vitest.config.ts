import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'dispatcher',
    environment: 'node',
  },
});
