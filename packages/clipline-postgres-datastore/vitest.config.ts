import { defineProject, mergeConfig } from 'vitest/config';
import baseConfig from '../../vitest.base.config';

export default mergeConfig(
  baseConfig,
  defineProject({
    test: {
      include: ['test/unit/**/*.test.ts'],
      poolOptions: { threads: { singleThread: true } },
      pool: 'threads',
      testTimeout: 20_000,
    },
  }),
);
