import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'platform',
    globals: false,
    environment: 'node',
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
  },
});
