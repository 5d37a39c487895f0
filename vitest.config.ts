import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'slidegrid',
    environment: 'node',
    include: ['packages/layout-engine/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/*.d.ts'],
  },
});
