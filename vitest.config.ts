import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    // Lock waits block their thread with Atomics.wait.
    pool: 'forks',
  },
});
