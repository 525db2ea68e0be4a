/**
 * Execution Channel Factory
 * Registers the direct and containerized channels
 */

import type { Logger } from 'pino'
import type { CommandRunner } from '../runtime/process-runner.js'
import type { TransientFiles } from '../runtime/transient-files.js'
import type { ContainerLocator } from '../containers/container-locator.js'
import { ExecutionChannelRegistry } from './channel-registry.js'
import { DirectChannel } from './direct-channel.js'
import { ContainerizedChannel } from './containerized-channel.js'

export interface ChannelDependencies {
  runner: CommandRunner
  locator: ContainerLocator
  transientFiles: TransientFiles
  logger: Logger
  /** Parent directory for the direct channel's option file */
  tempDir?: string
}

export function registerExecutionChannels (registry: ExecutionChannelRegistry, deps: ChannelDependencies): ExecutionChannelRegistry {
  registry.register('direct', () => new DirectChannel({
    runner: deps.runner,
    transientFiles: deps.transientFiles,
    logger: deps.logger,
    tempDir: deps.tempDir
  }))

  registry.register('containerized', () => new ContainerizedChannel({
    runner: deps.runner,
    locator: deps.locator,
    logger: deps.logger
  }))

  deps.logger.debug({ kinds: registry.getSupportedKinds() }, 'Execution channels registered')
  return registry
}

export function createChannelRegistry (deps: ChannelDependencies): ExecutionChannelRegistry {
  return registerExecutionChannels(new ExecutionChannelRegistry(), deps)
}
