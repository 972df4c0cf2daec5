import { z } from 'zod'
import { TurnValidationError } from '../errors.js'

/**
 * Identifier issued by a TurnStore for one turn.
 * Ids increase strictly with creation order and are never reused.
 */
export type StableId = number

/**
 * Identifier of a branch. Branch `0` is the implicit default branch.
 */
export type BranchId = number

/**
 * The default branch every history starts with.
 */
export const DEFAULT_BRANCH: BranchId = 0

/**
 * One recorded interaction: the prompts sent and the response received.
 * Turns are frozen when created and never change afterwards.
 *
 * @example
 * ```typescript
 * const turn: Turn = {
 *   id: 4,
 *   branch: 1,
 *   userPrompt: 'Try a shorter answer',
 *   response: 'Sure.',
 *   createdAt: '2026-01-05T10:00:00.000Z',
 *   forkParent: 2,
 * }
 * ```
 */
export interface Turn {
  readonly id: StableId
  readonly branch: BranchId
  readonly systemPrompt?: string
  readonly userPrompt?: string
  readonly response?: string

  /**
   * ISO 8601 timestamp of when the turn was stored.
   */
  readonly createdAt: string

  /**
   * Turn this branch was forked from. Only the first turn of a forked branch
   * carries it, and the referenced turn may belong to another branch.
   */
  readonly forkParent?: StableId
}

/**
 * Caller-supplied content of a turn. The store assigns id and timestamp.
 */
export interface TurnInput {
  /**
   * Branch the turn belongs to. Defaults to the default branch.
   */
  branch?: BranchId
  systemPrompt?: string
  userPrompt?: string
  response?: string
  forkParent?: StableId
}

/**
 * Plain serializable form of a Turn, for collaborators that export history.
 */
export interface TurnData {
  id: StableId
  branch: BranchId
  systemPrompt?: string
  userPrompt?: string
  response?: string
  createdAt: string
  forkParent?: StableId
}

const turnDataSchema = z
  .object({
    id: z.number().int().nonnegative(),
    branch: z.number().int().nonnegative(),
    systemPrompt: z.string().optional(),
    userPrompt: z.string().optional(),
    response: z.string().optional(),
    createdAt: z.iso.datetime(),
    forkParent: z.number().int().nonnegative().optional(),
  })
  .refine((data) => data.forkParent === undefined || data.forkParent < data.id, {
    message: 'forkParent must reference an earlier turn',
    path: ['forkParent'],
  })

/**
 * Builds a frozen Turn, leaving absent optional fields off the object.
 *
 * @param id - Id issued for the turn
 * @param createdAt - ISO 8601 creation timestamp
 * @param input - Caller-supplied content
 * @returns The frozen turn
 */
export function createTurn(id: StableId, createdAt: string, input: TurnInput): Turn {
  const turn: TurnData = { id, branch: input.branch ?? DEFAULT_BRANCH, createdAt }

  if (input.systemPrompt !== undefined) turn.systemPrompt = input.systemPrompt
  if (input.userPrompt !== undefined) turn.userPrompt = input.userPrompt
  if (input.response !== undefined) turn.response = input.response
  if (input.forkParent !== undefined) turn.forkParent = input.forkParent

  return Object.freeze(turn)
}

/**
 * Converts a turn to its serializable form.
 *
 * @param turn - The turn to convert
 * @returns A plain object holding the turn's fields
 */
export function turnToData(turn: Turn): TurnData {
  return { ...turn }
}

/**
 * Validates an unknown value as a turn record and rebuilds the Turn.
 *
 * @param value - Parsed JSON, typically read back by an export collaborator
 * @returns The frozen turn
 * @throws TurnValidationError listing every field that failed validation
 */
export function turnFromData(value: unknown): Turn {
  const result = turnDataSchema.safeParse(value)
  if (!result.success) {
    throw new TurnValidationError(formatValidationErrors(result.error.issues))
  }

  const { id, createdAt, ...input } = result.data
  return createTurn(id, createdAt, input)
}

/**
 * Formats Zod validation errors into a human-readable bullet list.
 *
 * @param issues - Array of Zod validation issues
 * @returns Formatted error message with bullet points
 */
export function formatValidationErrors(issues: z.ZodError['issues']): string {
  return issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'root'
      return `- Field '${path}': ${issue.message}`
    })
    .join('\n')
}
