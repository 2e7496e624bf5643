import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const local = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@contextstack/shared': local('./packages/shared/index.ts'),
      '@contextstack/ctxbudget': local('./packages/ctxbudget/src/index.ts'),
      '@contextstack/ctxscan': local('./packages/ctxscan/src/index.ts'),
    },
  },
  test: {
    include: ['tests/**/*.test.ts'],
  },
});
