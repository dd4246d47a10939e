import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'docstyle',
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['**/*.d.ts', '**/node_modules/**', '**/dist/**'],
  },
});
