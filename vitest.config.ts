import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

const workspacePackages = ['utils', 'core', 'timeline', 'conform', 'validation', 'host'];

export default defineConfig({
  resolve: {
    alias: Object.fromEntries(
      workspacePackages.map((name) => [
        `@edit-assist/${name}`,
        path.resolve(rootDir, `packages/${name}/src/index.ts`),
      ])
    ),
  },
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts', 'apps/*/tests/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
      NODE_ENV: 'test',
    },
  },
});
