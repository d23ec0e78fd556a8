/**
 * Vitest configuration.
 *
 * Mirrors the `@/` path alias from tsconfig.json so tests and sources
 * resolve imports the same way tsx does at runtime.
 */
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
  },
  test: {
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    environment: 'node',
    pool: 'forks',
  },
});
