import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: [
      'packages/**/test/**/*.spec.ts',
      'apps/**/test/**/*.spec.ts'
    ],
    reporters: ['default'],
    env: {
      // keep pino quiet unless a run asks for it
      LOG_LEVEL: process.env.LOG_LEVEL ?? 'silent'
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: [
        'packages/**/src/**/*.ts',
        'apps/**/src/**/*.ts'
      ],
      exclude: [
        '**/node_modules/**',
        '**/test/**',
        '**/*.spec.ts'
      ]
    }
  }
});
