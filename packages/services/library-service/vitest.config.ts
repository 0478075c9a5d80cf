import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromHere = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    name: 'library-service',
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    include: ['src/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      NODE_ENV: 'test',
    },
  },
  resolve: {
    alias: {
      '@shelfwise/platform-core': fromHere('../../platform-core/src/index.ts'),
      '@shelfwise/shared-contracts': fromHere('../../shared/contracts/src/index.ts'),
      '@domains': fromHere('./src/domains'),
      '@application': fromHere('./src/application'),
      '@infrastructure': fromHere('./src/infrastructure'),
      '@presentation': fromHere('./src/presentation'),
      '@config': fromHere('./src/config'),
    },
  },
});
