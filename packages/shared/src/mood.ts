import { z } from 'zod'

export const MoodEnum = z.enum(['happy', 'sad', 'upset', 'anxious', 'surprised', 'disgusted', 'calm', 'neutral'])
export type Mood = z.infer<typeof MoodEnum>

export const MOODS: readonly Mood[] = MoodEnum.options

// Classifier label -> mood vocabulary. Labels outside this table are ignored.
export const CLASSIFIER_LABEL_TO_MOOD: Readonly<Record<string, Mood>> = {
  joy: 'happy',
  sadness: 'sad',
  anger: 'upset',
  fear: 'anxious',
  surprise: 'surprised',
  disgust: 'disgusted',
  neutral: 'calm'
}

export const ConfidenceLabelEnum = z.enum([
  'Extremely confident',
  'Very confident',
  'Moderately confident',
  'Not very confident'
])
export type ConfidenceLabel = z.infer<typeof ConfidenceLabelEnum>

export function confidenceLabel(score: number): ConfidenceLabel {
  if (score >= 0.9) return 'Extremely confident'
  if (score >= 0.8) return 'Very confident'
  if (score >= 0.6) return 'Moderately confident'
  return 'Not very confident'
}

export function mapClassifierLabel(label: string): Mood | undefined {
  const key = label.trim().toLowerCase()
  return Object.prototype.hasOwnProperty.call(CLASSIFIER_LABEL_TO_MOOD, key)
    ? CLASSIFIER_LABEL_TO_MOOD[key]
    : undefined
}

export function isMood(value: unknown): value is Mood {
  return MoodEnum.safeParse(value).success
}
