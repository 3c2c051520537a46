// @vitest-environment node
import { TurnResultSchema, type SessionState } from '@aura/shared'
import { describe, expect, it } from 'vitest'
import { REFLECTIONS } from '../src/agents/reflections'
import { createCoordinator } from '../src/services/agents-container'
import { createCapabilities, type CapabilityProviders, type EmotionClassifierProvider } from '../src/services/capabilities'
import { InMemoryKeyValueStore } from '../src/services/kv-store'
import { HuggingFaceEmotionClassifier, type Fetcher } from '../src/services/providers'
import { MessageLog } from '../src/services/message-log'
import { CachedSessionStateStore } from '../src/services/session-store'
import { InvalidSessionIdError } from '../src/services/turn-coordinator'
import {
  ARTICLE,
  TRACK,
  VIDEO,
  classifier,
  jsonResponse,
  music,
  news,
  testConfig,
  unavailable,
  video
} from './helpers/fakes'

const NOW = new Date('2024-05-01T09:05:00Z')
const JOY = [
  { label: 'joy', score: 0.95 },
  { label: 'sadness', score: 0.02 }
]

const allProviders = (): CapabilityProviders => ({
  classifier: classifier(JOY),
  video: video(VIDEO),
  music: music(TRACK),
  news: news([ARTICLE])
})

function setup(
  providers: CapabilityProviders = allProviders(),
  opts: { env?: Record<string, string>; store?: CachedSessionStateStore; now?: () => Date } = {}
) {
  const config = testConfig({ SUPPORT_CONTEXT_GRACE_MS: '250', ...opts.env })
  const now = opts.now ?? (() => NOW)
  const capabilities = createCapabilities(providers, {
    classifierTimeoutMs: config.CLASSIFIER_TIMEOUT_MS,
    searchTimeoutMs: config.SEARCH_TIMEOUT_MS,
    textTimeoutMs: config.TEXT_TIMEOUT_MS,
    retries: config.CAPABILITY_RETRIES
  })
  const store = opts.store ?? new CachedSessionStateStore(new InMemoryKeyValueStore(), now)
  const log = new MessageLog()
  const coordinator = createCoordinator(config, { capabilities, store, log, now })
  return { coordinator, store, log }
}

describe('TurnCoordinator.processTurn', () => {
  it('resolves a full turn', async () => {
    const { coordinator } = setup()
    const result = await coordinator.processTurn('s1', 'I just got promoted!')

    expect(TurnResultSchema.safeParse(result).success).toBe(true)
    expect(result.mood).toBe('happy')
    expect(result.confidence).toBe(0.95)
    expect(result.confidence_label).toBe('Extremely confident')
    expect(result.timestamp).toBe('2024-05-01T09:05:00.000Z')
    expect(result.status).toBe('complete')
    expect(result.errors).toEqual([])
    expect(result.response).toBe(
      `It's wonderful to see you in good spirits! I found something that might resonate: "Morning stretch". What made today feel this bright?`
    )
    expect(result.response.toLowerCase()).not.toContain('error')
    expect(result.journal?.split('\n').slice(0, 2)).toEqual([
      `09:05 ${REFLECTIONS.timeSymbols.morning}`,
      'You: "I just got promoted!"'
    ])
    expect(result.journal_entries).toHaveLength(1)
    expect(result.journal_entries[0]).toMatchObject({
      turnId: result.turnId,
      timestamp: '2024-05-01T09:05:00.000Z',
      mood: 'happy',
      inputText: 'I just got promoted!'
    })
    expect(result.content).toEqual({
      video: VIDEO,
      music: TRACK,
      news: [ARTICLE],
      context_keyphrases: ['i', 'just', 'got']
    })
  })

  it('commits mood, content, journal and chat under the turn id', async () => {
    const { coordinator } = setup()
    const result = await coordinator.processTurn('s1', '  I just got promoted!  ')
    const session = await coordinator.getSession('s1')

    expect(session.moodHistory).toEqual([
      { turnId: result.turnId, mood: 'happy', confidence: 0.95, timestamp: '2024-05-01T09:05:00.000Z', source: 'classifier' }
    ])
    expect(session.contentHistory).toEqual(result.content)
    expect(session.chatHistory).toEqual([
      { turnId: result.turnId, sender: 'user', text: 'I just got promoted!', timestamp: result.timestamp, mood: 'happy' },
      { turnId: result.turnId, sender: 'assistant', text: result.response, timestamp: result.timestamp }
    ])
    expect(session.updatedAt).toBe(result.timestamp)
  })

  it('degrades to a neutral mood when the classifier times out', async () => {
    const { coordinator } = setup({ ...allProviders(), classifier: classifier('hang') })
    const result = await coordinator.processTurn('s1', 'hello there')

    expect(result.mood).toBe('neutral')
    expect(result.confidence).toBe(0)
    expect(result.confidence_label).toBe('Not very confident')
    expect(result.errors).toEqual([{ agent: 'emotion', kind: 'Timeout', message: 'fake-classifier exceeded 100ms' }])
    expect(result.status).toBe('in-progress')
    expect(result.response).toBe(
      'Thank you for sharing that with me. I found something that might resonate: "Morning stretch". How are you feeling right now?'
    )

    const session = await coordinator.getSession('s1')
    expect(session.moodHistory.map((m) => [m.mood, m.source])).toEqual([['neutral', 'fallback']])
  })

  const unreadableScores: Array<[string, () => EmotionClassifierProvider]> = [
    ['an empty score list', () => classifier([])],
    [
      'a payload that is not a score list',
      () => {
        const fetcher: Fetcher = async () => jsonResponse({ error: 'model is loading' })
        return new HuggingFaceEmotionClassifier({ token: 'test-token', model: 'm', fetcher })
      }
    ]
  ]

  for (const [name, makeClassifier] of unreadableScores) {
    it(`reads ${name} as a neutral mood without an error`, async () => {
      const { coordinator, log } = setup({ ...allProviders(), classifier: makeClassifier() })
      const result = await coordinator.processTurn('s1', 'hello there')

      expect(result.mood).toBe('neutral')
      expect(result.confidence).toBe(0)
      expect(result.errors).toEqual([])
      expect(result.status).toBe('complete')
      expect(log.list('s1')[0]?.agents.emotion).toBe('complete')

      const session = await coordinator.getSession('s1')
      expect(session.moodHistory.map((m) => [m.mood, m.confidence, m.source])).toEqual([['neutral', 0, 'classifier']])
    })
  }

  it('keeps the one search that succeeded', async () => {
    const { coordinator } = setup({ classifier: classifier(JOY), video: video(VIDEO), music: music(unavailable('music down')) })
    const result = await coordinator.processTurn('s1', 'I just got promoted!')

    expect(result.content).toEqual({ video: VIDEO, music: null, news: [], context_keyphrases: ['i', 'just', 'got'] })
    expect(result.errors).toEqual([
      { agent: 'curator', kind: 'ProviderUnavailable', message: 'music: music down' },
      { agent: 'curator', kind: 'ProviderUnavailable', message: 'news: news search is not configured' }
    ])
    expect(result.status).toBe('complete')
  })

  it('substitutes every field when all providers are missing', async () => {
    const { coordinator, log } = setup({})
    const result = await coordinator.processTurn('s1', 'anything at all')

    expect(result.mood).toBe('neutral')
    expect(result.content).toEqual({ video: null, music: null, news: [], context_keyphrases: [] })
    expect(result.response.length).toBeGreaterThan(0)
    expect(result.errors.map((e) => [e.agent, e.kind])).toEqual([
      ['emotion', 'ProviderUnavailable'],
      ['curator', 'ProviderUnavailable']
    ])
    // journal and support still produce their own output from templates
    expect(log.list('s1')[0]?.progress).toBe(50)
    expect(result.status).toBe('in-progress')
  })

  it('appends one mood record per turn', async () => {
    const { coordinator } = setup()
    for (const text of ['first', 'second', 'third']) {
      await coordinator.processTurn('s1', text)
    }
    const session = await coordinator.getSession('s1')
    expect(session.moodHistory).toHaveLength(3)
    expect(session.chatHistory).toHaveLength(6)
    expect(session.journalEntries.map((j) => j.inputText)).toEqual(['first', 'second', 'third'])
  })

  it('starts over after a reset', async () => {
    const { coordinator } = setup()
    await coordinator.processTurn('s1', 'first')
    await coordinator.processTurn('s1', 'second')
    await coordinator.resetSession('s1')
    const result = await coordinator.processTurn('s1', 'third')

    const session = await coordinator.getSession('s1')
    expect(session.moodHistory).toHaveLength(1)
    expect(result.journal_entries.map((j) => j.inputText)).toEqual(['third'])
  })

  it('loses no updates when turns for one session overlap', async () => {
    const { coordinator } = setup()
    const results = await Promise.all(['a', 'b', 'c', 'd', 'e'].map((text) => coordinator.processTurn('s1', text)))

    const session = await coordinator.getSession('s1')
    expect(session.moodHistory).toHaveLength(5)
    expect(new Set(session.moodHistory.map((m) => m.turnId))).toEqual(new Set(results.map((r) => r.turnId)))
    expect(session.chatHistory.filter((m) => m.sender === 'user').map((m) => m.text)).toEqual(['a', 'b', 'c', 'd', 'e'])
  })

  it('keeps session timestamps monotonic when the clock steps back', async () => {
    const clock = { current: new Date('2024-05-01T10:05:00Z') }
    const { coordinator } = setup(allProviders(), { now: () => clock.current })
    await coordinator.processTurn('s1', 'first')
    clock.current = new Date('2024-05-01T10:00:00Z')
    await coordinator.processTurn('s1', 'second')

    const session = await coordinator.getSession('s1')
    expect(session.moodHistory.map((m) => m.timestamp)).toEqual(['2024-05-01T10:05:00.000Z', '2024-05-01T10:05:00.000Z'])
    expect(session.journalEntries.map((j) => j.timestamp)).toEqual(['2024-05-01T10:05:00.000Z', '2024-05-01T10:05:00.000Z'])
  })

  it('abandons stages still running at the turn deadline', async () => {
    const { coordinator, log } = setup(
      { classifier: classifier(JOY), video: video('hang'), music: music('hang'), news: news('hang') },
      { env: { TURN_DEADLINE_MS: '60', SUPPORT_CONTEXT_GRACE_MS: '0' } }
    )
    const started = Date.now()
    const result = await coordinator.processTurn('s1', 'I just got promoted!')

    expect(Date.now() - started).toBeLessThan(1000)
    expect(result.errors).toEqual([{ agent: 'curator', kind: 'Timeout', message: 'turn deadline exceeded' }])
    expect(result.content).toEqual({ video: null, music: null, news: [], context_keyphrases: [] })
    expect(result.mood).toBe('happy')
    expect(log.list('s1')[0]?.agents).toEqual({
      emotion: 'complete',
      curator: 'error',
      journal: 'complete',
      support: 'complete',
      memory: 'complete',
      fallback: 'complete'
    })
  })

  it('still answers when the session cannot be saved', async () => {
    class FailingStore extends CachedSessionStateStore {
      override update(): Promise<SessionState> {
        return Promise.reject(new Error('write failed'))
      }
    }
    const { coordinator, log } = setup(allProviders(), { store: new FailingStore(new InMemoryKeyValueStore(), () => NOW) })
    const result = await coordinator.processTurn('s1', 'I just got promoted!')

    expect(result.mood).toBe('happy')
    expect(result.journal_entries).toHaveLength(1)
    expect(log.list('s1')).toHaveLength(1)
    expect((await coordinator.getSession('s1')).moodHistory).toEqual([])
  })
})

describe('TurnCoordinator input validation', () => {
  it('answers empty input without touching the session', async () => {
    const { coordinator, log } = setup()
    const result = await coordinator.processTurn('s1', '   ')

    expect(result.response).toBe(REFLECTIONS.invalidInputReply)
    expect(result.status).toBe('pending')
    expect(result.journal).toBeNull()
    expect(result.errors).toEqual([{ agent: 'coordinator', kind: 'InvalidInput', message: 'input is empty' }])
    expect((await coordinator.getSession('s1')).moodHistory).toEqual([])
    expect(log.list('s1')).toEqual([])
  })

  it('rejects input over the configured length', async () => {
    const { coordinator } = setup(allProviders(), { env: { MAX_INPUT_LENGTH: '10' } })
    const result = await coordinator.processTurn('s1', 'this is far too long')
    expect(result.errors).toEqual([
      { agent: 'coordinator', kind: 'InvalidInput', message: 'input exceeds the maximum length' }
    ])
  })

  it('rejects malformed session ids', async () => {
    const { coordinator } = setup()
    await expect(coordinator.processTurn('not a valid id!', 'hi')).rejects.toBeInstanceOf(InvalidSessionIdError)
    expect(() => coordinator.listAgentLog('')).toThrow(InvalidSessionIdError)
  })
})

describe('TurnCoordinator agent log', () => {
  it('records one entry per committed turn', async () => {
    const { coordinator } = setup()
    const result = await coordinator.processTurn('s1', 'I just got promoted!')

    expect(coordinator.listAgentLog('s1')).toEqual([
      {
        turnId: result.turnId,
        sessionId: 's1',
        timestamp: result.timestamp,
        mood: 'happy',
        confidence: 0.95,
        confidenceLabel: 'Extremely confident',
        agents: {
          emotion: 'complete',
          curator: 'complete',
          journal: 'complete',
          support: 'complete',
          memory: 'complete',
          fallback: 'pending'
        },
        progress: 100,
        status: 'complete',
        errors: []
      }
    ])
    expect(coordinator.agentLogEntry('s1', result.turnId)?.turnId).toBe(result.turnId)
    expect(coordinator.agentLogEntry('s2', result.turnId)).toBeUndefined()
  })

  it('keeps the log across a session reset', async () => {
    const { coordinator } = setup()
    await coordinator.processTurn('s1', 'first')
    await coordinator.resetSession('s1')
    expect(coordinator.listAgentLog('s1')).toHaveLength(1)
  })
})
