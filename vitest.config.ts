import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'json'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/server.ts', // Process entry point, exercised through the in-memory MCP client
        'src/transports/stdio.ts',
      ],
      thresholds: {
        statements: 90,
        branches: 80, // Lower for the REST client's response-shape fallbacks
        functions: 90,
        lines: 90,
      },
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
