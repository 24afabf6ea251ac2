import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['merge-dirs/src/**/*.test.ts'],
    environment: 'node'
  }
});
