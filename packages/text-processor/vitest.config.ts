import { defineConfig } from 'vitest/config';

import { defineConfig as defineBaseConfig } from '../../tools/vitest-config/src/index';

export default defineConfig(
  defineBaseConfig('text-processor', {
    coverageExclude: [
      'src/config/constants.ts', // Data tables only
      'src/segmenters/strategies/segment-strategy.ts', // Interface only
    ],
  }),
);
