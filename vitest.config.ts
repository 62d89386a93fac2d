import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    setupFiles: ['tests/setup.ts'],
    environment: 'node',
    include: [
      'core/**/*.test.ts',
      'interpreter/**/*.test.ts',
      'services/**/*.test.ts',
      'cli/**/*.test.ts',
      'api/**/*.test.ts',
      'tests/integration/**/*.test.ts'
    ],
    exclude: [
      'node_modules',
      'dist'
    ]
  }
});
