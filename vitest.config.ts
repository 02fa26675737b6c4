import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.spec.ts', 'test/scenarios/**/*.scenario-spec.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    pool: 'forks',
  },
});
