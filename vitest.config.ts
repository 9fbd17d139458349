import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const srcDir = fileURLToPath(new URL('./src', import.meta.url))

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    pool: 'forks',
    poolOptions: {
      forks: {
        // knex loads the .ts migration files through Node's own loader
        execArgv: ['--import', 'tsx'],
      },
    },
    include: ['test/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/test/**',
        '**/*.test.ts',
        '**/migrations/**',
      ],
      include: ['src/**/*.ts'],
    },
    globalSetup: './test/setup/global-setup.ts',
    testTimeout: 10000,
    hookTimeout: 10000,
  },
  resolve: {
    alias: [
      // Map .js imports to .ts files for path aliases
      {
        find: /^@root\/(.*)\.js$/,
        replacement: `${srcDir}/$1.ts`,
      },
      {
        find: /^@services\/(.*)\.js$/,
        replacement: `${srcDir}/services/$1.ts`,
      },
      {
        find: /^@plugins\/(.*)\.js$/,
        replacement: `${srcDir}/plugins/$1.ts`,
      },
      {
        find: /^@utils\/(.*)\.js$/,
        replacement: `${srcDir}/utils/$1.ts`,
      },
      {
        find: /^@schemas\/(.*)\.js$/,
        replacement: `${srcDir}/schemas/$1.ts`,
      },
    ],
    extensions: ['.ts', '.js', '.json'],
  },
})
