import { describe, it, expect } from 'vitest'
import { assembleMessages, lastMessageContent } from '../message-assembler.js'
import type { Turn } from '../../types/turn.js'

const createdAt = '2026-01-05T10:00:00.000Z'

function turn(id: number, fields: Partial<Turn>): Turn {
  return { id, branch: 0, createdAt, ...fields }
}

describe('assembleMessages', () => {
  it('emits system, user and assistant messages per turn in order', () => {
    const turns = [
      turn(0, { systemPrompt: 'Be brief', userPrompt: 'u1', response: 'r1' }),
      turn(1, { userPrompt: 'u2', response: 'r2' }),
    ]

    expect(assembleMessages(turns)).toEqual([
      { role: 'system', content: 'Be brief' },
      { role: 'user', content: 'u1' },
      { role: 'assistant', content: 'r1' },
      { role: 'user', content: 'u2' },
      { role: 'assistant', content: 'r2' },
    ])
  })

  it('builds the expected list for a window ending in an unanswered turn', () => {
    const turns = [
      turn(1, { userPrompt: 'u1', response: 'r1' }),
      turn(2, { userPrompt: 'u2', response: 'r2' }),
      turn(3, { userPrompt: 'u3' }),
    ]

    expect(assembleMessages(turns)).toEqual([
      { role: 'user', content: 'u1' },
      { role: 'assistant', content: 'r1' },
      { role: 'user', content: 'u2' },
      { role: 'assistant', content: 'r2' },
      { role: 'user', content: 'u3' },
    ])
  })

  it('skips empty and whitespace-only fields', () => {
    expect(assembleMessages([turn(0, { systemPrompt: '  \n', userPrompt: '', response: 'hi' })])).toEqual([
      { role: 'assistant', content: 'hi' },
    ])
  })

  it('trims message content', () => {
    expect(assembleMessages([turn(0, { userPrompt: '  spaced out \n' })])).toEqual([
      { role: 'user', content: 'spaced out' },
    ])
  })

  it('appends pending user text even after a user message', () => {
    expect(assembleMessages([turn(0, { userPrompt: 'first' })], 'second')).toEqual([
      { role: 'user', content: 'first' },
      { role: 'user', content: 'second' },
    ])
  })

  it('ignores blank pending user text', () => {
    expect(assembleMessages([turn(0, { response: 'r' })], '   ')).toEqual([{ role: 'assistant', content: 'r' }])
  })

  it('returns only the pending message when there are no turns', () => {
    expect(assembleMessages([], 'Hello')).toEqual([{ role: 'user', content: 'Hello' }])
  })

  it('returns identical output for identical input', () => {
    const turns = [turn(0, { systemPrompt: 's', userPrompt: 'u', response: 'r' })]
    expect(assembleMessages(turns, 'next')).toEqual(assembleMessages(turns, 'next'))
  })
})

describe('lastMessageContent', () => {
  const messages = assembleMessages([
    turn(0, { userPrompt: 'u1', response: 'r1' }),
    turn(1, { userPrompt: 'u2' }),
  ])

  it('returns the last user message', () => {
    expect(lastMessageContent(messages, 'user')).toBe('u2')
  })

  it('returns the last assistant message', () => {
    expect(lastMessageContent(messages, 'assistant')).toBe('r1')
  })

  it('returns an empty string when no message has the role', () => {
    expect(lastMessageContent(messages, 'system')).toBe('')
  })
})
