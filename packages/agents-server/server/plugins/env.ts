import { resolve } from 'node:path'
import { defineNitroPlugin } from 'nitropack/runtime'
import { loadEnvFiles } from '../../src/services/config'

// Runs before the config plugin; the repo root is read last so its .env.local wins
export default defineNitroPlugin(() => {
  loadEnvFiles([process.cwd(), resolve(process.cwd(), '..', '..')])
})
