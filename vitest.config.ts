import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const rootDir = fileURLToPath(new URL('.', import.meta.url))
const packageSrc = (name: string) => path.resolve(rootDir, 'packages', name, 'src', 'index.ts')

export default defineConfig({
  resolve: {
    alias: {
      '@replykit/infra-kit': packageSrc('infra-kit'),
      '@replykit/message-kit': packageSrc('message-kit'),
      '@replykit/command-kit': packageSrc('command-kit'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
  },
})
