import { z } from 'zod'
import reflectionsJson from '../data/reflections.json'

function moodTable<T extends z.ZodTypeAny>(value: T) {
  return z.object({
    happy: value,
    sad: value,
    upset: value,
    anxious: value,
    surprised: value,
    disgusted: value,
    calm: value,
    neutral: value
  })
}

const ReflectionsSchema = z.object({
  symbolCycle: z.array(z.string()).min(1),
  timeSymbols: z.object({ morning: z.string(), day: z.string(), evening: z.string(), night: z.string() }),
  journalLines: moodTable(z.array(z.string()).min(1)),
  journalQuestions: moodTable(z.string().min(1)),
  minimalJournal: z.array(z.string()).min(1),
  supportOpeners: moodTable(z.string().min(1)),
  supportQuestions: moodTable(z.string().min(1)),
  recoveryMessages: moodTable(z.string().min(1)),
  invalidInputReply: z.string().min(1),
  emotionalWords: z.array(z.string()),
  positiveNewsSources: z.string(),
  factualTopics: z.array(z.string()),
  factualPrefixes: z.array(z.string())
})

export type Reflections = z.infer<typeof ReflectionsSchema>

// Parsed once at load; a malformed table is a packaging error.
export const REFLECTIONS: Reflections = ReflectionsSchema.parse(reflectionsJson)
