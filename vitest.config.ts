import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['services/*/test/**/*.spec.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
    },
  },
});
