import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (dir: string): string =>
  fileURLToPath(new URL(dir, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@domain': fromRoot('./src/domain'),
      '@etl': fromRoot('./src/etl'),
      '@infrastructure': fromRoot('./src/infrastructure'),
    },
  },
});
