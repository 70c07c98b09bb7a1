import { configDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Keep tests away from local run data (schedule files, run logs).
    exclude: [
      ...configDefaults.exclude,
      'dist/**',
      'workspace/**',
      '.schedule/**',
    ],
  },
});
