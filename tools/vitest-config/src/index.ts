import type { UserConfig } from 'vitest/config';

const WORKSPACE_SOURCES = '{tools,packages,apps}/*/src';

/**
 * Shared test settings for the whole workspace, run from the repository root
 */
export const defineConfig = (options: UserConfig = {}): UserConfig => {
  return {
    ...options,
    test: {
      environment: 'node',
      globals: true,
      mockReset: true,
      clearMocks: true,
      pool: 'threads',
      include: [`${WORKSPACE_SOURCES}/**/*.{test,spec}.ts`],
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: [`${WORKSPACE_SOURCES}/**/*.ts`],
        exclude: [
          '**/index.ts',
          '**/*.test.ts',
          '**/testing/**',
          '**/types.ts',
        ],
      },
      ...options.test,
    },
  };
};
