/**
 * Credential Resolver
 * Merges the environment-prefixed admin settings with their defaults
 */

import type { Logger } from 'pino'
import {
  ERROR_CODES,
  environmentKeyPrefix,
  type AdminCredentials,
  type ContainerRef,
  type Environment
} from '@mysql-provision/shared'

/**
 * Key-value configuration source, usually process.env after dotenv has run
 */
export type ConfigLookup = (key: string) => string | undefined

export const DEFAULT_MYSQL_HOST = '127.0.0.1'
export const DEFAULT_ADMIN_USER = 'root'

export interface ResolvedCredentials {
  environment: Environment
  credentials: AdminCredentials
  /** Container pinned through {ENV}_DOCKER_CONTAINER */
  containerHint?: ContainerRef
  /** The admin password is empty and has to be collected interactively */
  needsInteractiveSecret: boolean
}

export function configKeys (env: Environment) {
  const prefix = environmentKeyPrefix(env)
  return {
    host: `${prefix}_MYSQL_HOST`,
    user: `${prefix}_ADMIN_USER`,
    password: `${prefix}_ADMIN_PASS`,
    container: `${prefix}_DOCKER_CONTAINER`
  }
}

export function envLookup (env: NodeJS.ProcessEnv = process.env): ConfigLookup {
  return (key) => env[key]
}

export function resolveCredentials (env: Environment, lookup: ConfigLookup, logger?: Logger): ResolvedCredentials {
  const keys = configKeys(env)

  const read = (key: string, fallback: string): string => {
    const value = lookup(key)?.trim()
    if (value === undefined || value === '') {
      logger?.debug({ key, code: ERROR_CODES.CONFIG_MISSING, fallback: fallback === '' ? undefined : fallback }, 'Configuration key not set, using default')
      return fallback
    }
    return value
  }

  const credentials: AdminCredentials = {
    host: read(keys.host, DEFAULT_MYSQL_HOST),
    user: read(keys.user, DEFAULT_ADMIN_USER),
    // Passwords keep surrounding whitespace
    password: lookup(keys.password) ?? ''
  }

  const container = read(keys.container, '')

  return {
    environment: env,
    credentials,
    ...(container !== '' ? { containerHint: { name: container } } : {}),
    needsInteractiveSecret: credentials.password === ''
  }
}

/**
 * Copy of `resolved` carrying an interactively collected admin password
 */
export function withAdminPassword (resolved: ResolvedCredentials, password: string): ResolvedCredentials {
  return {
    ...resolved,
    credentials: { ...resolved.credentials, password },
    needsInteractiveSecret: password === ''
  }
}
