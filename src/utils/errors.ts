/**
 * Central error classes and validation utilities for metamerge
 * @module utils/errors
 */

/**
 * Base error class for all metamerge errors
 */
export class MetamergeError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'MetamergeError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    Error.captureStackTrace?.(this, this.constructor)
  }
}

/**
 * Error thrown when a required parameter is missing
 */
export class MissingParameterError extends MetamergeError {
  public readonly parameterName: string

  constructor(parameterName: string, context?: Record<string, unknown>) {
    super(
      `Missing required parameter: '${parameterName}'`,
      'MISSING_PARAMETER',
      { parameterName, ...context }
    )
    this.name = 'MissingParameterError'
    this.parameterName = parameterName
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends MetamergeError {
  public readonly parameterName: string
  public readonly value: unknown
  public readonly reason: string

  constructor(
    parameterName: string,
    value: unknown,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid parameter '${parameterName}': ${reason}`,
      'INVALID_PARAMETER',
      { parameterName, value, reason, ...context }
    )
    this.name = 'InvalidParameterError'
    this.parameterName = parameterName
    this.value = value
    this.reason = reason
  }
}

/**
 * Error thrown when a run configuration is invalid. Always raised before any
 * entity is processed.
 */
export class ConfigurationError extends MetamergeError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a value is not null or undefined
 */
export function requireNonNull<T>(
  value: T | null | undefined,
  parameterName: string
): T {
  if (value === null || value === undefined) {
    throw new MissingParameterError(parameterName)
  }
  return value
}

/**
 * Validates that a number is within a specific range (inclusive)
 */
export function requireInRange(
  value: number,
  min: number,
  max: number,
  parameterName: string
): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a number'
    )
  }
  if (value < min || value > max) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be between ${min} and ${max} (inclusive)`
    )
  }
  return value
}

/**
 * Validates that a string is non-empty
 */
export function requireNonEmptyString(value: unknown, parameterName: string): string {
  if (typeof value !== 'string') {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a string'
    )
  }
  if (value.trim().length === 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must not be empty'
    )
  }
  return value
}

/**
 * Validates that a value is one of the allowed options
 */
export function requireOneOf<T>(
  value: unknown,
  allowedValues: readonly T[],
  parameterName: string
): T {
  const match = allowedValues.find((allowed) => allowed === value)
  if (match === undefined) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be one of: ${allowedValues.join(', ')}`
    )
  }
  return match
}

/**
 * Validates that an object is a valid plain object (not null, not array)
 */
export function requirePlainObject(
  value: unknown,
  parameterName: string
): Record<string, unknown> {
  if (!isPlainObject(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a plain object'
    )
  }
  return value
}

/**
 * Narrows a value to a plain object
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Check if an error is a metamerge error
 */
export function isMetamergeError(error: unknown): error is MetamergeError {
  return error instanceof MetamergeError
}

/**
 * Coerces an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
