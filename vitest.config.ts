import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['framework/**/__tests__/**/*.test.ts', 'projects/**/__tests__/**/*.test.ts'],
    restoreMocks: true,
  },
});
