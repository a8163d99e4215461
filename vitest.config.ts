import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: [
        'src/application/**',
        'src/infrastructure/store/**',
        'src/infrastructure/dynamodb/dynamo-record-store.ts',
        'src/infrastructure/db/pg-record-store.ts',
        'src/interfaces/http/**',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },
  },
});
