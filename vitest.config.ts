import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // Only include test files in tests/ directory
    include: ['tests/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/.git/**'],
    // Scheduler and watchdog tests swap in fake timers; keep files isolated
    poolOptions: {
      threads: {
        isolate: true,
      },
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
