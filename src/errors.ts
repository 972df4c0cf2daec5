/**
 * Error types for forkline.
 *
 * Lookups of evicted or unknown turns are not errors: they return `undefined`.
 * The classes here cover caller mistakes that should surface immediately.
 */

/**
 * Error thrown when an operation receives an argument it cannot accept.
 *
 * Examples include a non-positive store capacity, a negative branch id, or an
 * attempt to record a turn id out of order within its branch. These indicate a
 * programming error and should not be retried.
 */
export class InvalidArgumentError extends Error {
  /**
   * Creates a new InvalidArgumentError.
   *
   * @param message - Error message describing the rejected argument
   */
  constructor(message: string) {
    super(message)
    this.name = 'InvalidArgumentError'
  }
}

/**
 * Error thrown when a serialized turn record fails validation.
 */
export class TurnValidationError extends Error {
  /**
   * Formatted list of the fields that failed validation.
   */
  public readonly details: string

  /**
   * Creates a new TurnValidationError.
   *
   * @param details - One line per failing field, as produced by formatValidationErrors
   */
  constructor(details: string) {
    super(`Invalid turn record:\n${details}`)
    this.name = 'TurnValidationError'
    this.details = details
  }
}
