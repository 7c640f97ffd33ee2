import { coverageConfigDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['./src/**/*.test.{ts,tsx}'],
    coverage: {
      exclude: ['**/types/**', '**/*.d.ts', ...coverageConfigDefaults.exclude],
    },
  },
});
