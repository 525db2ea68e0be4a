import { z } from 'zod'

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Base provisioning error class
 */
export class ProvisionerError extends Error {
  constructor (
    message: string,
    public readonly code: string,
    public readonly hint?: string
  ) {
    super(message)
    this.name = 'ProvisionerError'
  }

  toJSON () {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      hint: this.hint,
      stack: this.stack
    }
  }
}

/**
 * Validation error for invalid input data
 */
export class ValidationError extends ProvisionerError {
  constructor (
    message: string,
    public readonly field?: string
  ) {
    super(message, 'VALIDATION_ERROR')
    this.name = 'ValidationError'
  }
}

/**
 * No container matched the MySQL naming heuristic
 */
export class ContainerNotFoundError extends ProvisionerError {
  constructor (
    message: string = 'No running MySQL or MariaDB container found',
    hint: string = 'Start a MySQL container or pass its name with --container'
  ) {
    super(message, 'CONTAINER_NOT_FOUND', hint)
    this.name = 'ContainerNotFoundError'
  }
}

/**
 * Neither a local mysql client nor a container to run one in
 */
export class ClientUnavailableError extends ProvisionerError {
  constructor (
    message: string = 'MySQL client not found and no MySQL Docker containers detected.',
    hint: string = 'Install mysql-client or start a MySQL Docker container.'
  ) {
    super(message, 'CLIENT_UNAVAILABLE', hint)
    this.name = 'ClientUnavailableError'
  }
}

/**
 * The credential artifact could not be written
 */
export class CredentialWriteError extends ProvisionerError {
  constructor (
    public readonly path: string,
    cause: string
  ) {
    super(
      `Failed to write credentials to ${path}: ${cause}`,
      'CREDENTIAL_WRITE_FAILED',
      'The database user exists with the new password; rerun to regenerate and save it.'
    )
    this.name = 'CredentialWriteError'
  }
}

/**
 * No execution channel registered for a target kind
 */
export class ChannelNotFoundError extends ProvisionerError {
  constructor (public readonly kind: string) {
    super(`No execution channel registered for target kind: ${kind}`, 'CHANNEL_NOT_FOUND')
    this.name = 'ChannelNotFoundError'
  }
}

/**
 * A channel was handed a target of another kind
 */
export class ChannelMismatchError extends ProvisionerError {
  constructor (expected: string, received: string) {
    super(`Channel for '${expected}' targets cannot execute a '${received}' target`, 'CHANNEL_MISMATCH')
    this.name = 'ChannelMismatchError'
  }
}

/**
 * Orchestrator operation called out of order
 */
export class InvalidStateError extends ProvisionerError {
  constructor (operation: string, state: string) {
    super(`Cannot ${operation} while ${state}`, 'INVALID_STATE')
    this.name = 'InvalidStateError'
  }
}

// =============================================================================
// Error Code Constants
// =============================================================================

export const ERROR_CODES = {
  // General errors
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',

  // Configuration errors (recovered with defaults)
  CONFIG_MISSING: 'CONFIG_MISSING',

  // Container errors
  CONTAINER_NOT_FOUND: 'CONTAINER_NOT_FOUND',

  // Execution errors
  CLIENT_UNAVAILABLE: 'CLIENT_UNAVAILABLE',
  CHANNEL_NOT_FOUND: 'CHANNEL_NOT_FOUND',
  CHANNEL_MISMATCH: 'CHANNEL_MISMATCH',
  INVALID_STATE: 'INVALID_STATE',

  // Output errors
  CREDENTIAL_WRITE_FAILED: 'CREDENTIAL_WRITE_FAILED'
} as const

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES]

// =============================================================================
// Error Schema
// =============================================================================

/**
 * Normalized error shape printed by the CLI
 */
export const ErrorResponseSchema = z.object({
  code: z.string(),
  message: z.string(),
  field: z.string().optional(), // For validation errors
  hint: z.string().optional()
})

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>

// =============================================================================
// Error Utilities
// =============================================================================

/**
 * Convert any error to a standardized ErrorResponse
 */
export function toErrorResponse (error: unknown): ErrorResponse {
  if (error instanceof ProvisionerError) {
    return {
      code: error.code,
      message: error.message,
      ...(error instanceof ValidationError && error.field ? { field: error.field } : {}),
      ...(error.hint ? { hint: error.hint } : {})
    }
  }

  if (error instanceof z.ZodError) {
    const firstIssue = error.issues[0]
    const field = firstIssue?.path?.join('.')
    return {
      code: ERROR_CODES.VALIDATION_ERROR,
      message: firstIssue?.message || 'Validation failed',
      ...(field ? { field } : {})
    }
  }

  if (error instanceof Error) {
    return {
      code: ERROR_CODES.INTERNAL_ERROR,
      message: error.message
    }
  }

  return {
    code: ERROR_CODES.INTERNAL_ERROR,
    message: 'An unexpected error occurred'
  }
}
