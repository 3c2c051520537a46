import { defineNitroConfig } from 'nitropack/config'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { loadEnvFiles } from './src/services/config'

const currentDir = dirname(fileURLToPath(import.meta.url))

// Package-local files are read last here so `nitro dev` picks up local overrides
loadEnvFiles([resolve(currentDir, '..', '..'), currentDir])

export default defineNitroConfig({
  compatibilityDate: '2025-09-02',
  srcDir: '.',
  // Everything is imported explicitly; server/ is outside Nitro's scan dirs
  imports: false,
  plugins: ['./server/plugins/env.ts', './server/plugins/config.ts', './server/plugins/request-logging.ts'],
  handlers: [{ route: '/api/**', middleware: true, handler: './server/middleware/cors.ts' }]
})
