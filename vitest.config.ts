import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: ['libs/utils', 'libs/platform', 'apps/server'],
  },
});
