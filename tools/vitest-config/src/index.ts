import type { UserConfig } from 'vitest/config';

export interface PackageTestOptions {
  /**
   * Source files left out of coverage (type-only modules, data tables)
   */
  coverageExclude?: string[];
}

/**
 * Shared test configuration for every workspace package.
 *
 * `name` labels the package's suite in the root project run.
 */
export const defineConfig = (
  name: string,
  options: PackageTestOptions = {},
): UserConfig => {
  return {
    test: {
      name,
      environment: 'node',
      globals: true,
      mockReset: true,
      clearMocks: true,
      pool: 'threads',
      include: ['src/**/*.{test,spec}.ts'],
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: ['src/**/*.ts'],
        exclude: [
          '**/index.ts',
          '**/*.test.ts',
          ...(options.coverageExclude ?? []),
        ],
        thresholds: {
          lines: 95,
          functions: 95,
          branches: 90,
          statements: 95,
        },
      },
    },
  };
};
