import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// segments-app imports the library by package name; resolve it to the sources.
const alias = {
  'push-segment-filters': fileURLToPath(new URL('./src/index.ts', import.meta.url)),
};

export default defineConfig({
  test: {
    projects: [
      {
        resolve: { alias },
        test: {
          name: 'unit',
          include: ['tests/unit/**/*.test.ts'],
          testTimeout: 5000,
        },
      },
      {
        resolve: { alias },
        test: {
          name: 'segments-app',
          include: ['segments-app/src/**/*.unit.test.ts', 'segments-app/tests/unit/**/*.test.ts'],
          testTimeout: 10000,
        },
      },
    ],
  },
});
