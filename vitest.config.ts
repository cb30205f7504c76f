import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@datapad/shared': path.resolve(rootDir, 'packages/shared/src/index.ts'),
      '@datapad/notes': path.resolve(rootDir, 'packages/notes/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: [
      'packages/shared/src/**/*.test.ts',
      'packages/notes/src/**/*.test.ts',
      'packages/cli/src/**/*.test.ts',
    ],
  },
});
