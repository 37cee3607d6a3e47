import { defineConfig } from 'vitest/config';

import { defineConfig as defineBaseConfig } from '../vitest-config/src/index';

export default defineConfig(defineBaseConfig('logger'));
