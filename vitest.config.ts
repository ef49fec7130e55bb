/**
 * Vitest configuration.
 *
 * Unit tests live beside their sources as *.test.ts; integration and CLI
 * tests live under tests/.
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    environment: 'node',
  },
});
