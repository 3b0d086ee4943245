import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  {
    extends: './vitest.config.ts',
    test: {
      name: 'settings',
      root: './packages/settings',
      include: ['tests/**/*.test.ts'],
      environment: 'node',
    },
  },
  {
    extends: './vitest.config.ts',
    test: {
      name: 'cli',
      root: './packages/cli',
      include: ['tests/**/*.test.ts'],
      environment: 'node',
    },
  },
]);
