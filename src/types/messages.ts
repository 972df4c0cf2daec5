/**
 * Role of a message in an assembled conversation.
 * 'system' carries instructions, 'user' human input, 'assistant' a model response.
 */
export type Role = 'system' | 'user' | 'assistant'

/**
 * A role-tagged message, in the shape chat completion clients accept.
 *
 * @example
 * ```typescript
 * const message: Message = { role: 'user', content: 'Hello' }
 * ```
 */
export interface Message {
  /**
   * The role of the message sender.
   */
  role: Role

  /**
   * Text content of the message, trimmed and never blank.
   */
  content: string
}
