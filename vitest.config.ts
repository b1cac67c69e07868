import { defineConfig } from 'vitest/config'
import { resolve } from 'path'
import { fileURLToPath } from 'url'

const root = fileURLToPath(new URL('.', import.meta.url))

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['packages/**/__tests__/**/*.test.ts'],
    // Run tests serially so the in-process stub services never race for ports
    pool: 'forks',
    poolOptions: {
      forks: { singleFork: true },
    },
  },
  resolve: {
    // Source aliases so tests run against TypeScript source without a prior build.
    alias: [
      {
        find: /^@fluxstate\/core$/,
        replacement: resolve(root, 'packages/flux-core/src/index.ts'),
      },
      {
        find: /^@fluxstate\/client$/,
        replacement: resolve(root, 'packages/flux-client/src/index.ts'),
      },
    ],
  },
})
