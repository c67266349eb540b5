import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const workspacePackages = ['contracts', 'logger', 'indicators', 'strategy', 'risk', 'exchange', 'app'];

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '*.config.ts'],
    },
  },
  resolve: {
    alias: Object.fromEntries(
      workspacePackages.map((name) => [
        `@tradeloop/${name}`,
        fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url)),
      ])
    ),
  },
});
