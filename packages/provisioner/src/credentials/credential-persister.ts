/**
 * Credential Persister
 * Writes the provisioned account to <dir>/<database>_<environment>.cred,
 * directory 0700 and file 0600. Reruns with the same key overwrite the file.
 */

import path from 'path'
import { mkdir, writeFile, chmod } from 'fs/promises'
import type { Logger } from 'pino'
import {
  CredentialWriteError,
  validateCredentialRecord,
  type CredentialRecord,
  type Environment
} from '@mysql-provision/shared'

export const DEFAULT_CREDENTIAL_DIR = 'db_credential'

export interface CredentialPersister {
  /** Returns the path written */
  persist (record: CredentialRecord): Promise<string>
}

export function credentialFileName (database: string, environment: Environment): string {
  return `${database}_${environment}.cred`
}

/**
 * UTC timestamp without milliseconds, e.g. 2026-10-18T12:00:00Z
 */
export function formatCreatedAt (date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z')
}

export function renderCredentialFile (record: CredentialRecord): string {
  return [
    `# created: ${formatCreatedAt(record.createdAt)}`,
    `environment: ${record.environment}`,
    `mysql_host: ${record.host}`,
    `database: ${record.database}`,
    `user: ${record.username}`,
    `user_host: ${record.userHost}`,
    `password: ${record.password}`,
    ''
  ].join('\n')
}

export class FileCredentialPersister implements CredentialPersister {
  private readonly logger: Logger

  constructor (
    private readonly dir: string,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'credential-persister' })
  }

  async persist (record: CredentialRecord): Promise<string> {
    const valid = validateCredentialRecord(record)
    const file = path.join(this.dir, credentialFileName(valid.database, valid.environment))

    try {
      await mkdir(this.dir, { recursive: true, mode: 0o700 })
      await chmod(this.dir, 0o700)
      await writeFile(file, renderCredentialFile(valid), { mode: 0o600 })
      // An existing file keeps its old mode on overwrite
      await chmod(file, 0o600)
    } catch (error) {
      throw new CredentialWriteError(file, error instanceof Error ? error.message : String(error))
    }

    this.logger.info({ file, database: valid.database, environment: valid.environment }, 'Credentials saved')
    return file
  }
}
