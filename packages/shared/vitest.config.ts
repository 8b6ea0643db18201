import {defineConfig, mergeConfig} from 'vitest/config';
import baseConfig from '../shared/src/tool/vitest-config.ts';

export default mergeConfig(
  baseConfig,
  defineConfig({
    test: {
      name: 'shared',
    },
  }),
);
