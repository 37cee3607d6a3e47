import { describe, expect, test } from 'vitest';

import { defineConfig } from './index';

describe('defineConfig', () => {
  test('labels the project and resets mocks between tests', () => {
    const config = defineConfig('text-processor');

    expect(config.test?.name).toBe('text-processor');
    expect(config.test?.environment).toBe('node');
    expect(config.test?.globals).toBe(true);
    expect(config.test?.mockReset).toBe(true);
    expect(config.test?.clearMocks).toBe(true);
    expect(config.test?.include).toEqual(['src/**/*.{test,spec}.ts']);
  });

  test('adds package-specific coverage exclusions', () => {
    const config = defineConfig('model', {
      coverageExclude: ['src/config/constants.ts'],
    });

    expect(config.test?.coverage?.exclude).toEqual([
      '**/index.ts',
      '**/*.test.ts',
      'src/config/constants.ts',
    ]);
  });
});
