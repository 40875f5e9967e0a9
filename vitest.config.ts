import { defineConfig, coverageConfigDefaults } from 'vitest/config'
import { resolve, dirname } from 'path'
import { fileURLToPath } from 'url'

const __dirname = dirname(fileURLToPath(import.meta.url))
const isCI = process.env.CI === 'true'

export default defineConfig({
  resolve: {
    alias: {
      '@health/core': resolve(__dirname, 'packages/health/src/index.ts'),
    },
  },
  test: {
    include: [
      'packages/*/src/**/*.test.ts',
    ],
    exclude: ['node_modules/**', 'dist/**'],
    // Handlers read configuration at runtime creation; keep tests on a fixed calendar zone
    env: {
      DATA_TIMEZONE: 'UTC',
    },

    coverage: {
      provider: 'v8',
      reporter: isCI ? ['text', 'json', 'lcov'] : ['text', 'html'],
      reportsDirectory: './coverage',

      include: [
        'packages/health/src/**/*.ts',
        'packages/functions/src/**/*.ts',
      ],

      exclude: [
        ...coverageConfigDefaults.exclude,
        '**/*.test.ts',
        '**/__tests__/**',
        '**/*.d.ts',
        '**/*.config.ts',
        '**/index.ts',
      ],

      thresholds: {
        lines: 60,
        branches: 50,
        functions: 60,
        statements: 60,
      },
    },
  },
})
