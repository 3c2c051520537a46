// @vitest-environment node
import { emptySessionState } from '@aura/shared'
import { describe, expect, it } from 'vitest'
import { TurnContext, TurnContextError, type MoodAssessment } from '../src/services/turn-context'

const HAPPY: MoodAssessment = { mood: 'happy', confidence: 0.95, confidenceLabel: 'Extremely confident', rawLabel: 'joy' }

function makeContext() {
  return new TurnContext({
    turnId: 'turn-1',
    sessionId: 's1',
    inputText: 'hello',
    session: emptySessionState('s1', new Date('2024-05-01T10:00:00Z'))
  })
}

describe('TurnContext ownership', () => {
  it('lets the owner write its field once', () => {
    const ctx = makeContext()
    ctx.write('emotion', 'mood', HAPPY)
    expect(ctx.get('mood')).toEqual(HAPPY)
    expect(ctx.provenanceOf('mood')).toBe('agent')
    expect(ctx.producedByOwner('mood')).toBe(true)
    expect(() => ctx.write('emotion', 'mood', HAPPY)).toThrow('mood was already written for turn turn-1')
  })

  it('rejects writes from agents that do not own the field', () => {
    const ctx = makeContext()
    expect(() => ctx.write('journal', 'responseText', 'hi')).toThrow(TurnContextError)
    expect(() => ctx.write('journal', 'responseText', 'hi')).toThrow('journal does not own responseText')
  })

  it('lets the fallback write only after the owner failed', () => {
    const ctx = makeContext()
    expect(() => ctx.write('fallback', 'responseText', 'x')).toThrow(
      'fallback cannot write responseText while support has not failed'
    )
    ctx.setStatus('support', 'error')
    ctx.write('fallback', 'responseText', 'recovery')
    expect(ctx.provenanceOf('responseText')).toBe('fallback')
    expect(ctx.producedByOwner('responseText')).toBe(false)
  })

  it('rejects a late write from an owner that already failed', () => {
    const ctx = makeContext()
    ctx.setStatus('emotion', 'error')
    expect(() => ctx.write('emotion', 'mood', HAPPY)).toThrow(
      'emotion already failed for turn turn-1; late write to mood rejected'
    )
  })

  it('freezes written values and the session snapshot', () => {
    const ctx = makeContext()
    ctx.write('curator', 'content', { video: null, music: null, news: [], context_keyphrases: ['calm'] })
    const content = ctx.get('content')
    expect(Object.isFrozen(content)).toBe(true)
    expect(Object.isFrozen(content?.context_keyphrases)).toBe(true)
    expect(Object.isFrozen(ctx.session.moodHistory)).toBe(true)
  })
})

describe('TurnContext lifecycle', () => {
  it('refuses every write after close', () => {
    const ctx = makeContext()
    ctx.close()
    expect(ctx.isClosed).toBe(true)
    expect(() => ctx.write('support', 'responseText', 'late')).toThrow('Turn turn-1 is closed; support cannot write responseText')
  })

  it('ignores status and error updates after close', () => {
    const ctx = makeContext()
    ctx.setStatus('curator', 'complete')
    ctx.close()
    ctx.setStatus('curator', 'error')
    ctx.recordError('curator', 'Timeout')
    expect(ctx.statusOf('curator')).toBe('complete')
    expect(ctx.errors).toEqual([])
  })

  it('keeps a failed status sticky', () => {
    const ctx = makeContext()
    ctx.setStatus('journal', 'error')
    ctx.setStatus('journal', 'complete')
    expect(ctx.statusOf('journal')).toBe('error')
  })

  it('records errors with and without a message', () => {
    const ctx = makeContext()
    ctx.recordError('curator', 'Timeout', 'video: slow')
    ctx.recordError('support', 'Unknown')
    expect(ctx.errors).toEqual([
      { agent: 'curator', kind: 'Timeout', message: 'video: slow' },
      { agent: 'support', kind: 'Unknown' }
    ])
  })

  it('only moves phases forward', () => {
    const ctx = makeContext()
    expect(ctx.phase).toBe('Created')
    ctx.advance('EmotionPending')
    ctx.advance('Dispatched')
    expect(ctx.phase).toBe('Dispatched')
    expect(() => ctx.advance('EmotionDone')).toThrow('Cannot move turn turn-1 from Dispatched back to EmotionDone')
  })
})

describe('TurnContext.waitFor', () => {
  it('resolves immediately with an existing value', async () => {
    const ctx = makeContext()
    ctx.write('support', 'responseText', 'ready')
    await expect(ctx.waitFor('responseText', 1000)).resolves.toBe('ready')
  })

  it('resolves when the field is written', async () => {
    const ctx = makeContext()
    const pending = ctx.waitFor('mood', 1000)
    ctx.write('emotion', 'mood', HAPPY)
    await expect(pending).resolves.toEqual(HAPPY)
  })

  it('resolves undefined after the wait elapses', async () => {
    const ctx = makeContext()
    await expect(ctx.waitFor('content', 10)).resolves.toBeUndefined()
  })

  it('resolves undefined on abort or close', async () => {
    const ctx = makeContext()
    const controller = new AbortController()
    const aborted = ctx.waitFor('content', 1000, controller.signal)
    const closed = ctx.waitFor('journalEntry', 1000)
    controller.abort()
    ctx.close()
    await expect(aborted).resolves.toBeUndefined()
    await expect(closed).resolves.toBeUndefined()
  })
})
