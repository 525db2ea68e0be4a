import { REDUCED_PRIVILEGES, type ProvisioningRequest } from './types.js'

// =============================================================================
// Escaping
// =============================================================================

/**
 * Quote an identifier (database name) with backticks, doubling embedded ones
 */
export function escapeIdentifier (value: string): string {
  return '`' + value.replace(/`/g, '``') + '`'
}

/**
 * Quote a string literal (user, host, password) with single quotes.
 * Embedded quotes are doubled; backslashes are doubled because MySQL treats
 * them as escape characters inside literals by default.
 */
export function escapeStringLiteral (value: string): string {
  return "'" + value.replace(/\\/g, '\\\\').replace(/'/g, "''") + "'"
}

/**
 * `'user'@'host'` account name
 */
export function accountName (username: string, userHost: string): string {
  return `${escapeStringLiteral(username)}@${escapeStringLiteral(userHost)}`
}

// =============================================================================
// Provisioning Script
// =============================================================================

export const DATABASE_CHARSET = 'utf8mb4'
export const DATABASE_COLLATION = 'utf8mb4_general_ci'

/**
 * Statements in execution order: create database, create user, reassert
 * the password, grant, flush. The ALTER USER runs unconditionally so an
 * account that already existed ends up with the new password too.
 */
export function buildProvisioningStatements (request: ProvisioningRequest): string[] {
  const database = escapeIdentifier(request.database)
  const account = accountName(request.username, request.userHost)
  const password = escapeStringLiteral(request.password)
  const privileges = request.grantFull ? 'ALL PRIVILEGES' : REDUCED_PRIVILEGES.join(', ')

  return [
    `CREATE DATABASE IF NOT EXISTS ${database} CHARACTER SET ${DATABASE_CHARSET} COLLATE ${DATABASE_COLLATION};`,
    `CREATE USER IF NOT EXISTS ${account} IDENTIFIED BY ${password};`,
    `ALTER USER ${account} IDENTIFIED BY ${password};`,
    `GRANT ${privileges} ON ${database}.* TO ${account};`,
    'FLUSH PRIVILEGES;'
  ]
}

/**
 * The script handed to the execution channel
 */
export function buildProvisioningScript (request: ProvisioningRequest): string {
  return buildProvisioningStatements(request).join('\n') + '\n'
}

/**
 * Same script with the new user's password replaced, for --dry-run output
 */
export function buildMaskedProvisioningScript (request: ProvisioningRequest): string {
  return buildProvisioningScript({ ...request, password: '********' })
}
