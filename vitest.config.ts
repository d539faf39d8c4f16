import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],

    // 一時ディレクトリを使うテストがあるため余裕を持たせる
    testTimeout: 30000,

    reporters: ['default'],
  },
});
