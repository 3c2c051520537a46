import { z } from 'zod'
import { ConfidenceLabelEnum, MoodEnum } from './mood'

export const ErrorKindEnum = z.enum(['Timeout', 'ProviderUnavailable', 'InvalidInput', 'Unknown'])
export type ErrorKind = z.infer<typeof ErrorKindEnum>

export const AgentNameEnum = z.enum(['emotion', 'curator', 'journal', 'support', 'memory', 'fallback'])
export type AgentName = z.infer<typeof AgentNameEnum>

export const AgentStatusEnum = z.enum(['pending', 'in-progress', 'complete', 'error'])
export type AgentStatus = z.infer<typeof AgentStatusEnum>

export const TurnStatusEnum = z.enum(['complete', 'in-progress', 'pending'])
export type TurnStatus = z.infer<typeof TurnStatusEnum>

export const TurnErrorSchema = z.object({
  agent: z.union([AgentNameEnum, z.literal('coordinator')]),
  kind: ErrorKindEnum,
  message: z.string().optional()
})
export type TurnError = z.infer<typeof TurnErrorSchema>

export const MediaItemSchema = z.object({
  title: z.string().min(1),
  url: z.string().default(''),
  description: z.string().default(''),
  thumbnail: z.string().default(''),
  artist: z.string().default(''),
  uri: z.string().optional()
})
export type MediaItem = z.infer<typeof MediaItemSchema>

export const NewsArticleSchema = z.object({
  title: z.string().min(1),
  url: z.string().default(''),
  source: z.string().default(''),
  snippet: z.string().default('')
})
export type NewsArticle = z.infer<typeof NewsArticleSchema>

// Canonical content shape. Missing sub-results are explicit: null media, empty lists.
export const ContentBundleSchema = z.object({
  video: MediaItemSchema.nullable(),
  music: MediaItemSchema.nullable(),
  news: z.array(NewsArticleSchema),
  context_keyphrases: z.array(z.string())
})
export type ContentBundle = z.infer<typeof ContentBundleSchema>

export function emptyContentBundle(): ContentBundle {
  return { video: null, music: null, news: [], context_keyphrases: [] }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function unwrapContent(raw: unknown): Record<string, unknown> | null {
  if (!isRecord(raw)) return null
  const hasOwnFields = 'video' in raw || 'music' in raw || 'news' in raw || 'context_keyphrases' in raw
  // Older payloads nest the bundle one level deeper under `content`
  if (!hasOwnFields && isRecord(raw.content)) return raw.content
  return raw
}

/**
 * Coerce any content payload (canonical, nested under `content`, partially
 * filled or with placeholder `{}` media) into the canonical bundle.
 */
export function normalizeContentBundle(raw: unknown): ContentBundle {
  const source = unwrapContent(raw)
  if (!source) return emptyContentBundle()

  const video = MediaItemSchema.safeParse(source.video)
  const music = MediaItemSchema.safeParse(source.music)
  const news: NewsArticle[] = []
  if (Array.isArray(source.news)) {
    for (const item of source.news) {
      const parsed = NewsArticleSchema.safeParse(item)
      if (parsed.success) news.push(parsed.data)
    }
  }
  const keyphrases = Array.isArray(source.context_keyphrases)
    ? source.context_keyphrases.filter((k): k is string => typeof k === 'string' && k.trim().length > 0)
    : []

  return {
    video: video.success ? video.data : null,
    music: music.success ? music.data : null,
    news,
    context_keyphrases: keyphrases
  }
}

export const JournalEntrySchema = z.object({
  id: z.string(),
  turnId: z.string(),
  timestamp: z.string(),
  mood: MoodEnum,
  text: z.string().min(1),
  inputText: z.string()
})
export type JournalEntry = z.infer<typeof JournalEntrySchema>

export const TurnResultSchema = z.object({
  turnId: z.string(),
  response: z.string().min(1),
  mood: MoodEnum,
  confidence: z.number().min(0).max(1),
  confidence_label: ConfidenceLabelEnum,
  timestamp: z.string(),
  journal: z.string().nullable(),
  journal_entries: z.array(JournalEntrySchema),
  content: ContentBundleSchema,
  status: TurnStatusEnum,
  errors: z.array(TurnErrorSchema)
})
export type TurnResult = z.infer<typeof TurnResultSchema>

export const AgentStatusMapSchema = z.object({
  emotion: AgentStatusEnum,
  curator: AgentStatusEnum,
  journal: AgentStatusEnum,
  support: AgentStatusEnum,
  memory: AgentStatusEnum,
  fallback: AgentStatusEnum
})
export type AgentStatusMap = z.infer<typeof AgentStatusMapSchema>

export const AgentLogEntrySchema = z.object({
  turnId: z.string(),
  sessionId: z.string(),
  timestamp: z.string(),
  mood: MoodEnum,
  confidence: z.number(),
  confidenceLabel: ConfidenceLabelEnum,
  agents: AgentStatusMapSchema,
  progress: z.number().int().min(0).max(100),
  status: TurnStatusEnum,
  errors: z.array(TurnErrorSchema)
})
export type AgentLogEntry = z.infer<typeof AgentLogEntrySchema>

export function turnStatusFromProgress(progress: number): TurnStatus {
  if (progress >= 100) return 'complete'
  if (progress > 0) return 'in-progress'
  return 'pending'
}
