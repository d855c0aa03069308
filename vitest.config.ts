import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'pegkit',
    environment: 'node',
    include: ['test/**/*.test.ts'],
  },
});
