/**
 * Conversion of recorded turns into the message list a generation client sends.
 */

import type { Message, Role } from '../types/messages.js'
import type { Turn } from '../types/turn.js'
import { hasText } from '../types/validation.js'

/**
 * Builds an ordered, role-tagged message list from turns.
 *
 * For each turn in order this emits its system prompt, user prompt and response
 * as system, user and assistant messages. Absent or blank fields are skipped and
 * content is trimmed. A non-blank `pendingUserText` becomes one final user
 * message, even when the last turn already ended with a user message.
 *
 * The function is pure: the same arguments always give the same list.
 *
 * @param turns - Turns in conversation order
 * @param pendingUserText - Text of a request not yet answered
 * @returns The assembled messages
 *
 * @example
 * ```typescript
 * assembleMessages([{ id: 0, branch: 0, createdAt, userPrompt: 'Hi', response: 'Hello!' }], 'How are you?')
 * // [
 * //   { role: 'user', content: 'Hi' },
 * //   { role: 'assistant', content: 'Hello!' },
 * //   { role: 'user', content: 'How are you?' },
 * // ]
 * ```
 */
export function assembleMessages(turns: readonly Turn[], pendingUserText?: string): Message[] {
  const messages: Message[] = []

  for (const turn of turns) {
    pushIfText(messages, 'system', turn.systemPrompt)
    pushIfText(messages, 'user', turn.userPrompt)
    pushIfText(messages, 'assistant', turn.response)
  }
  pushIfText(messages, 'user', pendingUserText)

  return messages
}

/**
 * Returns the content of the last message with the given role.
 *
 * @param messages - Assembled messages
 * @param role - Role to look for
 * @returns The content, or an empty string if no message has that role
 */
export function lastMessageContent(messages: readonly Message[], role: Role): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i]
    if (message !== undefined && message.role === role) {
      return message.content
    }
  }
  return ''
}

function pushIfText(messages: Message[], role: Role, content: string | undefined): void {
  if (hasText(content)) {
    messages.push({ role, content: content.trim() })
  }
}
