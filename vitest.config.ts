import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const src = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    // workspace packages resolve to their TypeScript sources, no build needed
    alias: {
      '@number-guess/protocol': src('./packages/protocol/src/index.ts'),
      '@number-guess/game-core': src('./packages/game-core/src/index.ts'),
    },
  },
  test: {
    include: ['{packages,apps}/*/src/**/*.{test,spec}.ts'],
    exclude: ['**/dist/**', '**/node_modules/**'],
    environment: 'node',
    globals: true, // allows `describe/it/expect` without imports
    reporters: ['default'],
    coverage: {
      enabled: false, // toggle via npm script when wanted
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
    },
  },
});
