/**
 * Vitest Configuration
 *
 * - environment: 'node'
 * - coverage: v8 provider with text and lcov reporters
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'mixup',
    globals: false,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/cli.ts'],
    },
  },
});
