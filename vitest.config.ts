import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: [{ find: /^@\//, replacement: fileURLToPath(new URL('./src/', import.meta.url)) }],
  },
  test: {
    environment: 'node',
    setupFiles: ['src/tests/setup.ts'],
    include: ['src/tests/**/test-*.ts'],
    sequence: {
      concurrent: false,
    },
    testTimeout: 30000,
  },
});
