import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const workspaceRoot = path.dirname(fileURLToPath(import.meta.url));

const workspacePackages = [
  'core-logging',
  'core-validation',
  'core-retry',
  'core-signature',
  'core-installations',
  'core-loop-guard',
  'core-queue',
  'core-tasks',
  'core-webhooks',
  'core-worker',
  'provider-github',
  'provider-jira',
  'provider-slack',
  'provider-sentry',
  'adapter-express'
];

const resolveAlias = Object.fromEntries(
  workspacePackages.map((name) => [`@taskhook/${name}`, path.join(workspaceRoot, 'packages', name, 'src/index.ts')])
);

export default defineConfig({
  resolve: {
    alias: resolveAlias
  },
  test: {
    environment: 'node',
    globals: true,
    reporters: ['default'],
    include: ['packages/*/tests/**/*.test.ts', 'apps/*/tests/**/*.test.ts'],
    restoreMocks: true
  }
});
