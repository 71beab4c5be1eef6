import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const currentDir = path.dirname(fileURLToPath(import.meta.url));
const resolvePackageEntry = (pkg: string) => path.resolve(currentDir, `packages/${pkg}/src/index.ts`);

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/*/src/**/*.{test,spec}.ts', 'packages/*/src/**/*.{test,spec}.ts'],
    env: {
      NODE_ENV: 'test',
    },
  },
  resolve: {
    alias: [
      { find: '@sms-gateway/core', replacement: resolvePackageEntry('core') },
      { find: '@sms-gateway/contracts', replacement: resolvePackageEntry('sms-contracts') },
    ],
  },
});
