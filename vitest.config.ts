import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const sharedDir = fileURLToPath(new URL('./shared', import.meta.url));

export default defineConfig({
  test: {
    include: ['shared/**/*.spec.ts'],
    environment: 'node',
    alias: {
      '@shared': sharedDir,
    },
  },
  resolve: {
    alias: {
      '@shared': sharedDir,
    },
  },
});
