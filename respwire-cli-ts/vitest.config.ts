import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/index.ts',       // CLI entry point
        'src/types.ts'        // Type definitions only
      ],
    },
    include: ['tests/**/*.test.ts'],
  },
});
