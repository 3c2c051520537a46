import { z } from 'zod'
import { MoodEnum } from './mood'
import { ContentBundleSchema, JournalEntrySchema } from './turn'

export const MoodHistoryEntrySchema = z.object({
  turnId: z.string(),
  mood: MoodEnum,
  confidence: z.number().min(0).max(1),
  timestamp: z.string(),
  source: z.enum(['classifier', 'fallback'])
})
export type MoodHistoryEntry = z.infer<typeof MoodHistoryEntrySchema>

export const ChatMessageSchema = z.object({
  turnId: z.string(),
  sender: z.enum(['user', 'assistant']),
  text: z.string(),
  timestamp: z.string(),
  mood: MoodEnum.optional()
})
export type ChatMessage = z.infer<typeof ChatMessageSchema>

// Persisted layout: one record per session id.
export const SessionStateSchema = z.object({
  sessionId: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  moodHistory: z.array(MoodHistoryEntrySchema),
  journalEntries: z.array(JournalEntrySchema),
  contentHistory: ContentBundleSchema.nullable(),
  chatHistory: z.array(ChatMessageSchema)
})
export type SessionState = z.infer<typeof SessionStateSchema>

export function emptySessionState(sessionId: string, now: Date = new Date()): SessionState {
  const iso = now.toISOString()
  return {
    sessionId,
    createdAt: iso,
    updatedAt: iso,
    moodHistory: [],
    journalEntries: [],
    contentHistory: null,
    chatHistory: []
  }
}

export const SessionIdSchema = z
  .string()
  .trim()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9_.:-]+$/, 'Session id may only contain letters, digits and _ . : -')
