import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['toolkit/tests/**/*.test.ts'],
    environment: 'node',
  },
});
