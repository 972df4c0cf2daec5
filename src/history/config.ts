import { z } from 'zod'
import { InvalidArgumentError } from '../errors.js'
import { formatValidationErrors } from '../types/turn.js'

/**
 * Default number of turns a history keeps resident.
 */
export const DEFAULT_CAPACITY = 50

/**
 * Default number of trailing branch turns used to build a request.
 */
export const DEFAULT_CONTEXT_LIMIT = 10

/**
 * Configuration for a ConversationHistory.
 *
 * @example
 * ```typescript
 * const config: HistoryConfig = {
 *   capacity: 200,
 *   contextLimit: 20,
 * }
 * ```
 */
export interface HistoryConfig {
  /**
   * Maximum number of resident turns across all branches.
   * Defaults to 50.
   */
  capacity?: number

  /**
   * Number of trailing turns read from a branch when no limit is given.
   * Defaults to 10.
   */
  contextLimit?: number

  /**
   * Source of turn timestamps. Defaults to the system clock.
   */
  clock?: () => Date
}

const positiveInteger = z.coerce.number().int().positive()

const envSchema = z.object({
  FORKLINE_CAPACITY: positiveInteger.optional(),
  FORKLINE_CONTEXT_LIMIT: positiveInteger.optional(),
})

/**
 * Reads history configuration from environment variables.
 *
 * - `FORKLINE_CAPACITY`: resident turn capacity
 * - `FORKLINE_CONTEXT_LIMIT`: default branch window
 *
 * Unset or empty variables fall back to the defaults.
 *
 * @param env - Environment to read, defaults to `process.env`
 * @returns The resolved configuration
 * @throws InvalidArgumentError if a variable is set to something other than a positive integer
 */
export function loadHistoryConfigFromEnv(env: Record<string, string | undefined> = process.env): HistoryConfig {
  const parsed = envSchema.safeParse({
    FORKLINE_CAPACITY: nonEmpty(env.FORKLINE_CAPACITY),
    FORKLINE_CONTEXT_LIMIT: nonEmpty(env.FORKLINE_CONTEXT_LIMIT),
  })
  if (!parsed.success) {
    throw new InvalidArgumentError(`Invalid history environment:\n${formatValidationErrors(parsed.error.issues)}`)
  }

  return {
    capacity: parsed.data.FORKLINE_CAPACITY ?? DEFAULT_CAPACITY,
    contextLimit: parsed.data.FORKLINE_CONTEXT_LIMIT ?? DEFAULT_CONTEXT_LIMIT,
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value
}
