// vitest.config.ts
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true, // Use Vitest globals (describe, it, expect, etc.)
    include: ['src/**/*.test.ts'],
  },
});
