import { defineEventHandler } from 'h3'
import { getCapabilities } from '../../../src/services/agents-container'
import { getLogger } from '../../../src/services/logger'

export default defineEventHandler(() => {
  const providers = getCapabilities().available()
  // The coordinator degrades without a classifier, it does not stop
  const status = providers.classifier ? 'healthy' : 'degraded'
  getLogger().debug('health_probe', { status, providers })

  return {
    status,
    timestamp: new Date().toISOString(),
    uptimeSeconds: Math.round(process.uptime()),
    providers,
    env: {
      nodeEnv: process.env.NODE_ENV || 'development'
    }
  }
})
