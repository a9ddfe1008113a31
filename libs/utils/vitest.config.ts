import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'utils',
    globals: false,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
