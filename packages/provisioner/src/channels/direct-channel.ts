/**
 * Direct execution channel
 * Runs the local mysql client against the server over the network. Admin
 * credentials go through a temporary option file readable only by the
 * current user, removed whether or not the client succeeds.
 */

import os from 'os'
import path from 'path'
import { mkdtemp, writeFile, chmod } from 'fs/promises'
import type { Logger } from 'pino'
import {
  ChannelMismatchError,
  type AdminCredentials,
  type DirectTarget,
  type ExecutionOutcome,
  type ExecutionTarget
} from '@mysql-provision/shared'
import type { CommandRunner } from '../runtime/process-runner.js'
import type { TransientFiles } from '../runtime/transient-files.js'
import {
  MYSQL_CLIENT,
  diagnosticsOf,
  failedOutcome,
  succeededOutcome,
  type ExecutionChannel
} from './execution-channel.js'

export const OPTION_FILE_NAME = 'client.cnf'

/**
 * Quote a value for a MySQL option file
 */
export function quoteOptionValue (value: string): string {
  return '"' + value.replace(/\\/g, '\\\\').replace(/"/g, '\\"') + '"'
}

export function renderClientOptionFile (admin: AdminCredentials, host: string): string {
  return [
    '[client]',
    `user=${quoteOptionValue(admin.user)}`,
    `password=${quoteOptionValue(admin.password)}`,
    `host=${quoteOptionValue(host)}`,
    ''
  ].join('\n')
}

export interface DirectChannelOptions {
  runner: CommandRunner
  transientFiles: TransientFiles
  logger: Logger
  /** Parent directory of the option file, os.tmpdir() by default */
  tempDir?: string
}

export class DirectChannel implements ExecutionChannel {
  readonly kind = 'direct' as const

  private readonly runner: CommandRunner
  private readonly transientFiles: TransientFiles
  private readonly logger: Logger
  private readonly tempDir: string

  constructor (options: DirectChannelOptions) {
    this.runner = options.runner
    this.transientFiles = options.transientFiles
    this.logger = options.logger.child({ component: 'direct-channel' })
    this.tempDir = options.tempDir ?? os.tmpdir()
  }

  async execute (target: ExecutionTarget, script: string): Promise<ExecutionOutcome> {
    const direct = this.narrow(target)

    let dir: string
    try {
      dir = await mkdtemp(path.join(this.tempDir, 'mysql-provision-'))
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.logger.error({ error: message }, 'Failed to create option file directory')
      return failedOutcome(`Could not prepare client option file: ${message}`)
    }
    this.transientFiles.track(dir)

    try {
      await chmod(dir, 0o700)
      const optionFile = path.join(dir, OPTION_FILE_NAME)
      await writeFile(optionFile, renderClientOptionFile(direct.admin, direct.host), { mode: 0o600 })
      await chmod(optionFile, 0o600)

      this.logger.debug({ host: direct.host, user: direct.admin.user }, 'Running mysql client')

      const result = await this.runner.run(
        MYSQL_CLIENT,
        [`--defaults-extra-file=${optionFile}`, '--batch'],
        { input: script }
      )

      if (result.error || result.exitCode !== 0) {
        this.logger.debug({ exitCode: result.exitCode }, 'mysql client failed')
        return failedOutcome(diagnosticsOf(result))
      }

      return succeededOutcome(result.stderr.trim())
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.logger.error({ error: message }, 'Failed to prepare client option file')
      return failedOutcome(`Could not prepare client option file: ${message}`)
    } finally {
      await this.transientFiles.release(dir)
    }
  }

  describe (target: ExecutionTarget): string {
    return `MySQL server at ${this.narrow(target).host}`
  }

  troubleshooting (_target: ExecutionTarget): string[] {
    return [
      'Authentication failed - Check your password',
      'Network connectivity - Verify the host is reachable',
      'MySQL service not running - Check if MySQL is running on target host',
      'Firewall blocking - Ensure port 3306 is open',
      'User permissions - Verify the user can connect from your IP',
      'If using Docker, make sure port is mapped (e.g., -p 3306:3306)'
    ]
  }

  private narrow (target: ExecutionTarget): DirectTarget {
    if (target.kind !== 'direct') {
      throw new ChannelMismatchError(this.kind, target.kind)
    }
    return target
  }
}
