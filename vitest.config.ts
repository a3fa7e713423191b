import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    testTimeout: 30_000,
    server: {
      deps: {
        // Workspace packages export their TypeScript sources.
        inline: [/@chronokv\//],
      },
    },
  },
});
