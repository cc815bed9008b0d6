import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const alias = {
  '@kube-control/http-core': fileURLToPath(new URL('./libs/http-core/src/index.ts', import.meta.url)),
  '@kube-control/kube-client': fileURLToPath(new URL('./libs/kube-client/src/index.ts', import.meta.url)),
};

export default defineConfig({
  test: {
    environment: 'node',
    include: ['libs/*/src/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
