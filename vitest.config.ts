import * as path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      'layerlens-shared': path.resolve(__dirname, 'layerlens-shared/src/index.ts'),
    },
  },
  test: {
    include: ['layerlens-*/src/**/*.test.ts'],
    environment: 'node',
  },
});
