import { z } from 'zod'
import { defineEventHandler, readBody } from 'h3'
import { SessionIdSchema } from '@aura/shared'
import { getCoordinator } from '../../../src/services/agents-container'
import { parseRequest } from '../../../src/utils/http'

const TurnRequestSchema = z.object({
  sessionId: SessionIdSchema,
  inputText: z.string()
})

export default defineEventHandler(async (event) => {
  const body = await readBody(event)
  const payload = parseRequest(TurnRequestSchema, body, 'turn request')
  return getCoordinator().processTurn(payload.sessionId, payload.inputText)
})
