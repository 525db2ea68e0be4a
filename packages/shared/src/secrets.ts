import crypto from 'crypto'

/**
 * Number of random bytes behind a generated password
 */
export const GENERATED_PASSWORD_BYTES = 16

/**
 * Generate a password for the new database user: 16 random bytes as 32
 * lowercase hex characters, so it never contains '/' or '\'.
 */
export function generatePassword (bytes: number = GENERATED_PASSWORD_BYTES): string {
  return crypto.randomBytes(bytes).toString('hex')
}

/**
 * Replace a secret for display
 */
export function maskSecret (value: string): string {
  return value.length === 0 ? '(empty)' : '********'
}
