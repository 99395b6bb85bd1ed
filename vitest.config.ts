import { defineConfig } from 'vitest/config'
import path from 'node:path'
import { fileURLToPath } from 'node:url'

const __filename = fileURLToPath(import.meta.url)
const __dirname  = path.dirname(__filename)

export default defineConfig({
  // Ensure Vite/Vitest root is a plain string path (not URL/object)
  root: __dirname,
  test: {
    include: [
      'tests/**/*.test.ts',
      'task-service/src/**/*.test.ts',
      'edge-gateway/test/**/*.test.ts',
      'sdk/**/*.test.ts',
    ],
    exclude: ['dist/**', 'node_modules/**'],
    allowOnly: false,
    testTimeout: 10_000,
    poolOptions: {
      threads: { singleThread: true }
    }
  }
})
