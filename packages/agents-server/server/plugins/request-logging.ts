import { getHeader, getResponseStatus, setResponseHeader } from 'h3'
import { defineNitroPlugin } from 'nitropack/runtime'
import { genCorrelationId, getLogger } from '../../src/services/logger'

export default defineNitroPlugin((nitroApp) => {
  nitroApp.hooks.hook('request', (event) => {
    const incoming = getHeader(event, 'x-correlation-id')?.trim()
    const correlationId = incoming || genCorrelationId()
    event.context.correlationId = correlationId
    event.context.requestStartedAt = Date.now()
    setResponseHeader(event, 'x-correlation-id', correlationId)
  })

  nitroApp.hooks.hook('afterResponse', (event) => {
    const started = event.context.requestStartedAt
    getLogger().info('http_request', {
      method: event.method,
      path: event.path,
      status: getResponseStatus(event),
      correlationId: event.context.correlationId,
      durationMs: typeof started === 'number' ? Date.now() - started : undefined
    })
  })

  nitroApp.hooks.hook('error', (error, { event }) => {
    getLogger().error('http_error', {
      path: event?.path,
      correlationId: event?.context.correlationId,
      error: error.message
    })
  })
})
