import { defineNitroPlugin } from 'nitropack/runtime'
import { ConfigError, getConfig } from '../../src/services/config'
import { getCoordinator } from '../../src/services/agents-container'
import { getLogger } from '../../src/services/logger'

export default defineNitroPlugin(() => {
  try {
    const config = getConfig()
    getLogger().info('config_loaded', { sessionStore: config.SESSION_STORE, turnDeadlineMs: config.TURN_DEADLINE_MS })
  } catch (err) {
    if (err instanceof ConfigError) {
      getLogger().error('config_invalid', { issues: err.issues })
    }
    // Throwing during plugin init prevents the server from starting
    throw err
  }
  // Build providers and stores up front so the first turn does not pay for it
  getCoordinator()
})
