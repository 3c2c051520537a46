import type { z } from 'zod'
import { ProviderError } from '../capabilities'

export type Fetcher = typeof globalThis.fetch

type FetchError = Error & { name?: string }

export function isAbort(err: unknown): err is FetchError {
  return err instanceof Error && err.name === 'AbortError'
}

/** Collapse whitespace and cut to `max` characters. */
export function cleanText(text: unknown, max: number): string {
  if (typeof text !== 'string' || !text) return ''
  return text.replace(/\s+/g, ' ').trim().slice(0, max)
}

/**
 * Send a request. Transport failures and non-2xx statuses become
 * ProviderError; aborts are rethrown untouched so the caller's deadline
 * decides the outcome.
 */
export async function fetchOk(fetcher: Fetcher, provider: string, url: string, init: RequestInit): Promise<Response> {
  let response: Response
  try {
    response = await fetcher(url, init)
  } catch (err) {
    if (isAbort(err)) throw err
    throw new ProviderError(`${provider} request failed: ${err instanceof Error ? err.message : String(err)}`, {
      retryable: true
    })
  }

  if (!response.ok) {
    throw ProviderError.fromStatus(provider, response.status)
  }
  return response
}

/** Fetch a JSON document and validate it against `schema`. */
export async function requestJson<T>(
  fetcher: Fetcher,
  provider: string,
  url: string,
  init: RequestInit,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  const response = await fetchOk(fetcher, provider, url, init)

  let json: unknown
  try {
    json = await response.json()
  } catch (err) {
    if (isAbort(err)) throw err
    throw new ProviderError(`${provider} returned invalid JSON`, { retryable: false })
  }

  const parsed = schema.safeParse(json)
  if (!parsed.success) {
    throw new ProviderError(`${provider} returned an unexpected payload`, { retryable: false })
  }
  return parsed.data
}
