import { config as loadDotenv } from 'dotenv'
import { resolve } from 'node:path'
import { z } from 'zod'

const intFromEnv = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback)

const optionalSecret = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined))

export const AppConfigSchema = z.object({
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),

  // Per-agent budgets (ms)
  EMOTION_TIMEOUT_MS: intFromEnv(3000, 1),
  CURATOR_TIMEOUT_MS: intFromEnv(6000, 1),
  JOURNAL_TIMEOUT_MS: intFromEnv(5000, 1),
  SUPPORT_TIMEOUT_MS: intFromEnv(6000, 1),
  MEMORY_TIMEOUT_MS: intFromEnv(1000, 1),
  TURN_DEADLINE_MS: intFromEnv(12000, 1),
  SUPPORT_CONTEXT_GRACE_MS: intFromEnv(250),

  // Per-capability budgets (ms)
  CLASSIFIER_TIMEOUT_MS: intFromEnv(2500, 1),
  SEARCH_TIMEOUT_MS: intFromEnv(4000, 1),
  TEXT_TIMEOUT_MS: intFromEnv(4500, 1),
  CAPABILITY_RETRIES: intFromEnv(1),

  MAX_INPUT_LENGTH: intFromEnv(4000, 1),

  SESSION_STORE: z.enum(['memory', 'file']).default('memory'),
  SESSION_STORE_DIR: z.string().default('.data/sessions'),

  HUGGINGFACE_TOKEN: optionalSecret,
  HUGGINGFACE_EMOTION_MODEL: z.string().default('j-hartmann/emotion-english-distilroberta-base'),
  HUGGINGFACE_API_BASE_URL: z.string().url().default('https://api-inference.huggingface.co'),
  YOUTUBE_API_KEY: optionalSecret,
  SPOTIFY_CLIENT_ID: optionalSecret,
  SPOTIFY_CLIENT_SECRET: optionalSecret,
  TAVILY_API_KEY: optionalSecret,
  OPENAI_API_KEY: optionalSecret,
  OPENAI_DEFAULT_MODEL: z.string().trim().min(1).default('gpt-4o-mini')
})

export type AppConfig = z.infer<typeof AppConfigSchema>

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = AppConfigSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`))
  }
  return parsed.data
}

let cached: AppConfig | null = null

export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig()
  return cached
}

export function resetConfig() {
  cached = null
}

/**
 * Load `.env` then `.env.local` from each directory in turn. Values already in
 * the environment win over `.env`; `.env.local` overrides everything before it.
 */
export function loadEnvFiles(dirs: readonly string[]) {
  for (const dir of dirs) {
    loadDotenv({ path: resolve(dir, '.env'), override: false })
    loadDotenv({ path: resolve(dir, '.env.local'), override: true })
  }
  resetConfig()
}
