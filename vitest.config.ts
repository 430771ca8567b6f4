import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const source = (path: string) => fileURLToPath(new URL(`./packages/${path}`, import.meta.url))

export default defineConfig({
  // ワークスペースパッケージはビルドせずソースから解決
  resolve: {
    alias: [
      { find: /^@portalkeep\/core\/logger$/, replacement: source('core/src/logger/index.ts') },
      { find: /^@portalkeep\/core$/, replacement: source('core/src/index.ts') },
      { find: /^@portalkeep\/config$/, replacement: source('config/src/index.ts') },
    ],
  },

  test: {
    // テストファイルパターン
    include: ['packages/*/tests/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],

    // 環境設定
    environment: 'node',

    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'error',
    },

    globals: true,

    testTimeout: 10000,
    hookTimeout: 10000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'coverage/**',
        'dist/**',
        '**/node_modules/**',
        '**/tests/**',
        '**/*.test.ts',
        '**/*.config.*',
        '**/types.ts',
        '**/index.ts',
      ],
    },

    pool: 'threads',
    watch: false,

    // セットアップファイル
    setupFiles: ['./tests/setup.ts'],
  },

  esbuild: {
    target: 'node20',
  },
})
