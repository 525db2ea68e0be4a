/**
 * Containerized execution channel
 * Pipes the script into the mysql client of a running container. The admin
 * password reaches the client as MYSQL_PWD, set only in the environment of
 * the docker process; `-e MYSQL_PWD` without a value makes docker copy it
 * from there, so it never appears in an argument list.
 */

import type { Logger } from 'pino'
import {
  ChannelMismatchError,
  type ContainerizedTarget,
  type ExecutionOutcome,
  type ExecutionTarget
} from '@mysql-provision/shared'
import type { CommandRunner, RunOptions } from '../runtime/process-runner.js'
import type { ContainerLocator } from '../containers/container-locator.js'
import { CONTAINER_RUNTIME } from '../containers/container-locator.js'
import {
  MYSQL_CLIENT,
  diagnosticsOf,
  failedOutcome,
  succeededOutcome,
  type ExecutionChannel
} from './execution-channel.js'

export const PASSWORD_ENV_VAR = 'MYSQL_PWD'

/**
 * docker arguments and child environment for running the client in `target`
 */
export function buildContainerInvocation (target: ContainerizedTarget): { args: string[], env?: Record<string, string> } {
  const password = target.admin.password
  const args = ['exec', '-i']

  if (password !== '') {
    args.push('-e', PASSWORD_ENV_VAR)
  }

  args.push(target.container.name, MYSQL_CLIENT, '-h', target.innerHost, '-u', target.admin.user)

  return password !== ''
    ? { args, env: { [PASSWORD_ENV_VAR]: password } }
    : { args }
}

export interface ContainerizedChannelOptions {
  runner: CommandRunner
  locator: ContainerLocator
  logger: Logger
}

export class ContainerizedChannel implements ExecutionChannel {
  readonly kind = 'containerized' as const

  private readonly runner: CommandRunner
  private readonly locator: ContainerLocator
  private readonly logger: Logger

  constructor (options: ContainerizedChannelOptions) {
    this.runner = options.runner
    this.locator = options.locator
    this.logger = options.logger.child({ component: 'containerized-channel' })
  }

  async execute (target: ExecutionTarget, script: string): Promise<ExecutionOutcome> {
    const containerized = this.narrow(target)
    const container = containerized.container.name

    // Status can change between locating the container and using it
    if (!(await this.locator.validateRunning(containerized.container))) {
      this.logger.warn({ container }, 'Container is not running')
      return failedOutcome(`Docker container '${container}' is not running.`, 'container_not_running')
    }

    const { args, env } = buildContainerInvocation(containerized)
    const options: RunOptions = env ? { input: script, env } : { input: script }

    this.logger.debug({ container, innerHost: containerized.innerHost, role: containerized.role }, 'Running mysql client in container')

    const result = await this.runner.run(CONTAINER_RUNTIME, args, options)

    if (result.error || result.exitCode !== 0) {
      this.logger.debug({ container, exitCode: result.exitCode }, 'mysql client in container failed')
      return failedOutcome(diagnosticsOf(result))
    }

    return succeededOutcome(result.stderr.trim())
  }

  describe (target: ExecutionTarget): string {
    const containerized = this.narrow(target)
    return containerized.role === 'server'
      ? `MySQL in Docker container: ${containerized.container.name}`
      : `MySQL server at ${containerized.innerHost} using Docker container: ${containerized.container.name}`
  }

  troubleshooting (target: ExecutionTarget): string[] {
    const containerized = this.narrow(target)
    const causes = [
      'Authentication failed - Check your password',
      'Container not running - Verify container is running: docker ps',
      'Wrong container name - Check container name: docker ps',
      'MySQL not installed in container - Verify MySQL is installed in the container'
    ]

    if (containerized.role === 'client') {
      causes.push(`Host ${containerized.innerHost} not reachable from container - Check network connectivity`)
    }

    return causes
  }

  private narrow (target: ExecutionTarget): ContainerizedTarget {
    if (target.kind !== 'containerized') {
      throw new ChannelMismatchError(this.kind, target.kind)
    }
    return target
  }
}
