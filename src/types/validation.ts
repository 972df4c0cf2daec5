import { InvalidArgumentError } from '../errors.js'

/**
 * Ensures a value is a positive integer.
 *
 * @param value - The value to check
 * @param fieldName - Name of the field for error reporting
 * @returns The value if it is a positive integer
 * @throws InvalidArgumentError if value is zero, negative, fractional or not finite
 */
export function ensurePositiveInteger(value: number, fieldName: string): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError(`Expected ${fieldName} to be a positive integer, but got ${value}`)
  }
  return value
}

/**
 * Ensures a value is a non-negative integer, as required of turn and branch ids.
 *
 * @param value - The value to check
 * @param fieldName - Name of the field for error reporting
 * @returns The value if it is a non-negative integer
 * @throws InvalidArgumentError otherwise
 */
export function ensureNonNegativeInteger(value: number, fieldName: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(`Expected ${fieldName} to be a non-negative integer, but got ${value}`)
  }
  return value
}

/**
 * Returns true when a prompt or response field carries visible text.
 */
export function hasText(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== ''
}
