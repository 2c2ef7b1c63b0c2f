import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: [
      'tools/logger/vitest.config.ts',
      'packages/shared/vitest.config.ts',
      'packages/refiner/vitest.config.ts',
      'apps/cli/vitest.config.ts',
    ],
  },
});
