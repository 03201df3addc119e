import { fileURLToPath } from 'url'
import { defineConfig } from 'vitest/config'

const fromRoot = (dir: string) => fileURLToPath(new URL(dir, import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@domain': fromRoot('./src/domain'),
      '@application': fromRoot('./src/application'),
      '@infrastructure': fromRoot('./src/infrastructure'),
      '@presentation': fromRoot('./src/presentation'),
    },
  },
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
  },
})
