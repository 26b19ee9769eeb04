import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Lowers `using` declarations, which Node 20 cannot parse
  esbuild: { target: 'node20' },
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // Each test file gets its own process, so process-level state stays isolated
    pool: 'forks',
    testTimeout: 20000,
  },
});
