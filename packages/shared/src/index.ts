// Shared types, errors and SQL helpers for mysql-provision

export * from './types.js'
export * from './errors.js'
export * from './validation.js'
export * from './sql.js'
export * from './secrets.js'

export const PROVISIONER_VERSION = '0.1.0'
