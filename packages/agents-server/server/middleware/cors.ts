import { defineEventHandler, getHeader, setHeader } from 'h3'

export function resolveAllowlist(env: Record<string, string | undefined> = process.env): string[] {
  const raw = env.CORS_ALLOW_ORIGINS || ''
  const defaults = env.NODE_ENV !== 'production'
    ? ['http://localhost:3000', 'http://localhost:5173', 'http://127.0.0.1:5173']
    : []
  const allowlist = (raw ? raw.split(',') : []).map((s) => s.trim()).filter(Boolean)
  return allowlist.length > 0 ? allowlist : defaults
}

export default defineEventHandler((event) => {
  const path = event.path || ''
  if (!path.startsWith('/api/')) return

  const origin = getHeader(event, 'origin') || ''
  const allowlist = resolveAllowlist()
  const isAllowed = Boolean(origin) && (allowlist.includes('*') || allowlist.includes(origin))

  if (!isAllowed) {
    // No CORS headers for non-allowed or non-CORS requests
    return
  }

  setHeader(event, 'Vary', 'Origin')
  setHeader(event, 'Access-Control-Allow-Origin', origin)
  setHeader(event, 'Access-Control-Allow-Methods', 'GET,POST,OPTIONS')
  setHeader(event, 'Access-Control-Allow-Headers', 'content-type,x-correlation-id')
  setHeader(event, 'Access-Control-Max-Age', 600)

  // Short-circuit preflight
  if (event.method === 'OPTIONS') {
    const res = event.node.res
    res.statusCode = 204
    res.end()
  }
})
