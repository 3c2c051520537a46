import { fileURLToPath } from 'node:url'
import { defineConfig, configDefaults } from 'vitest/config'

export default defineConfig({
  resolve: {
    alias: {
      '@aura/shared': fileURLToPath(new URL('./packages/shared/src/index.ts', import.meta.url))
    }
  },
  test: {
    environment: 'node',
    include: ['packages/*/__tests__/**/*.spec.ts'],
    exclude: [...configDefaults.exclude, '**/.output/**'],
    root: fileURLToPath(new URL('./', import.meta.url)),
    env: {
      LOG_SILENT: 'true'
    }
  }
})
