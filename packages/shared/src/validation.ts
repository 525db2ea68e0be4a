import { z } from 'zod'
import { ValidationError } from './errors.js'
import {
  ContainerRefSchema,
  CredentialRecordSchema,
  DatabaseNameSchema,
  EnvironmentSchema,
  PasswordSchema,
  ProvisioningRequestSchema,
  UserHostSchema,
  UsernameSchema,
  type Environment
} from './types.js'

// =============================================================================
// Validation Helper Functions
// =============================================================================

/**
 * Generic validation function with error handling
 */
export function validate<T> (schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, context?: string): T {
  try {
    return schema.parse(data)
  } catch (error) {
    if (error instanceof z.ZodError) {
      const firstIssue = error.issues[0]
      const field = firstIssue?.path?.join('.') || undefined
      const message = context
        ? `${context}: ${firstIssue?.message || 'Validation failed'}`
        : firstIssue?.message || 'Validation failed'

      throw new ValidationError(message, field)
    }
    throw error
  }
}

export type SafeValidationResult<T> =
  | { success: true, data: T }
  | { success: false, error: ValidationError }

/**
 * Safe validation that returns result object instead of throwing
 */
export function validateSafe<T> (schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): SafeValidationResult<T> {
  const result = schema.safeParse(data)
  if (result.success) {
    return { success: true, data: result.data }
  }

  const firstIssue = result.error.issues[0]
  return {
    success: false,
    error: new ValidationError(
      firstIssue?.message || 'Validation failed',
      firstIssue?.path?.join('.') || undefined
    )
  }
}

// =============================================================================
// Field Validators
// =============================================================================

export const validateDatabaseName = (data: unknown) =>
  validate(DatabaseNameSchema, data)

export const validateUsername = (data: unknown) =>
  validate(UsernameSchema, data)

export const validateUserHost = (data: unknown) =>
  validate(UserHostSchema, data)

export const validatePassword = (data: unknown) =>
  validate(PasswordSchema, data)

export const validateContainerRef = (data: unknown) =>
  validate(ContainerRefSchema, data, 'Invalid container')

export const validateProvisioningRequest = (data: unknown) =>
  validate(ProvisioningRequestSchema, data, 'Invalid provisioning request')

export const validateCredentialRecord = (data: unknown) =>
  validate(CredentialRecordSchema, data, 'Invalid credential record')

// =============================================================================
// Environment Parsing
// =============================================================================

const ENVIRONMENT_ALIASES: Record<string, Environment> = {
  production: 'prod'
}

/**
 * Parse an environment name typed by the operator.
 * Case-insensitive, empty input means `dev`, `production` means `prod`.
 */
export function parseEnvironment (input: string | undefined): Environment {
  const normalized = (input ?? '').trim().toLowerCase()
  if (normalized === '') {
    return 'dev'
  }

  const parsed = EnvironmentSchema.safeParse(ENVIRONMENT_ALIASES[normalized] ?? normalized)
  if (!parsed.success) {
    throw new ValidationError('Please enter local, dev, or prod.', 'environment')
  }
  return parsed.data
}

/**
 * Prefix of the configuration keys read for an environment
 */
export function environmentKeyPrefix (env: Environment): string {
  return env.toUpperCase()
}
