import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['bridge-service/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
