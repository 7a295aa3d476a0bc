import path from 'path';
import { defineConfig } from 'vitest/config';

const PACKAGES = ['shared', 'repo', 'exec', 'adapters', 'core', 'cli'];

export default defineConfig({
  resolve: {
    // Workspace packages resolve to their sources, so tests never need a build.
    alias: Object.fromEntries(
      PACKAGES.map((name) => [`@patchloop/${name}`, path.resolve(__dirname, 'packages', name, 'src')]),
    ),
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'packages/*/test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/.tmp/**', '**/__fixtures__/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/*.d.ts',
        '**/*.test.ts',
        '**/test/**',
        '**/__fixtures__/**',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },
  },
});
