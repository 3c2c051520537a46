import { createError } from 'h3'
import type { z } from 'zod'
import { SessionIdSchema } from '@aura/shared'

/** Validate a request value, answering 400 with the zod issues on failure. */
export function parseRequest<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what = 'request'): T {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    throw createError({
      statusCode: 400,
      statusMessage: `Invalid ${what}`,
      data: { issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })) }
    })
  }
  return parsed.data
}

export function parseSessionId(value: unknown): string {
  return parseRequest(SessionIdSchema, value, 'session id')
}
