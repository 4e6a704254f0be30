import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';
import swc from 'unplugin-swc';

const libPath = (path: string) =>
  fileURLToPath(new URL(`./libs/${path}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@clan-lookup/shared-types': libPath('shared-types/src/index.ts'),
      '@clan-lookup/wg-api-client': libPath('wg-api-client/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['{apps,libs}/*/src/**/*.spec.ts'],
    setupFiles: ['./vitest.setup.ts'],
  },
  plugins: [swc.vite()],
});
