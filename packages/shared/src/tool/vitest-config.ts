import {defineConfig} from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.{test,spec}.?(c|m)[jt]s?(x)'],
    silent: 'passed-only',
    typecheck: {
      enabled: false,
    },
    testTimeout: 10_000,
  },
});
