/**
 * Provisioning Orchestrator
 * Drives one provisioning run: collecting inputs, channel selected,
 * executing, then succeeded or failed.
 */

import { v4 as uuidv4 } from 'uuid'
import type { Logger } from 'pino'
import {
  CredentialWriteError,
  InvalidStateError,
  buildProvisioningScript,
  validateProvisioningRequest,
  type Environment,
  type ExecutionTarget,
  type FailureKind,
  type ProvisioningRequest,
  type ProvisioningRequestInput
} from '@mysql-provision/shared'
import type { ExecutionChannel } from '../channels/execution-channel.js'
import type { ExecutionChannelRegistry } from '../channels/channel-registry.js'
import { connectionHostOf } from '../channels/execution-target.js'
import type { CredentialPersister } from '../credentials/credential-persister.js'

export type OrchestratorState =
  | 'collecting_inputs'
  | 'channel_selected'
  | 'executing'
  | 'succeeded'
  | 'failed'

export interface ProvisioningSuccess {
  status: 'succeeded'
  exitCode: 0
  credentialPath: string
  request: ProvisioningRequest
  target: ExecutionTarget
}

export interface ProvisioningFailure {
  status: 'failed'
  exitCode: 1
  failure: FailureKind
  summary: string
  /** Likely causes, or the remediation for a stopped container */
  checklist: string[]
  diagnosticLog: string
  target: ExecutionTarget
}

export type ProvisioningResult = ProvisioningSuccess | ProvisioningFailure

export interface OrchestratorConfig {
  environment: Environment
  channels: ExecutionChannelRegistry
  persister: CredentialPersister
  logger: Logger
  now?: () => Date
}

export class ProvisioningOrchestrator {
  private readonly config: OrchestratorConfig
  private readonly logger: Logger
  private readonly now: () => Date
  private current: OrchestratorState = 'collecting_inputs'
  private selected?: { target: ExecutionTarget, channel: ExecutionChannel }

  constructor (config: OrchestratorConfig) {
    this.config = config
    this.now = config.now ?? (() => new Date())
    this.logger = config.logger.child({ component: 'orchestrator', runId: uuidv4() })
  }

  get state (): OrchestratorState {
    return this.current
  }

  /**
   * Fix the execution target for this run
   */
  selectChannel (target: ExecutionTarget): ExecutionChannel {
    this.expect('collecting_inputs', 'select a channel')

    const channel = this.config.channels.create(target.kind)
    this.selected = { target, channel }
    this.transition('channel_selected')
    this.logger.info({ kind: target.kind, destination: channel.describe(target) }, 'Execution channel selected')
    return channel
  }

  /**
   * Validate the request, run the script once, and save the credentials on success
   */
  async provision (input: ProvisioningRequestInput): Promise<ProvisioningResult> {
    const selected = this.selected
    if (this.current !== 'channel_selected' || !selected) {
      throw new InvalidStateError('provision', this.current)
    }

    let request: ProvisioningRequest
    try {
      request = validateProvisioningRequest(input)
    } catch (error) {
      this.transition('failed')
      throw error
    }

    const { target, channel } = selected
    const script = buildProvisioningScript(request)

    this.transition('executing')
    this.logger.info({
      database: request.database,
      username: request.username,
      userHost: request.userHost,
      grantFull: request.grantFull
    }, 'Executing provisioning script')

    const outcome = await channel.execute(target, script)

    if (!outcome.success) {
      this.transition('failed')
      const failure = outcome.failure ?? 'execution_failed'
      this.logger.error({ failure }, 'Provisioning script failed')
      return {
        status: 'failed',
        exitCode: 1,
        failure,
        summary: this.failureSummary(failure, target),
        checklist: failure === 'container_not_running' && target.kind === 'containerized'
          ? [`Please start the container first: docker start ${target.container.name}`]
          : channel.troubleshooting(target),
        diagnosticLog: outcome.diagnosticLog,
        target
      }
    }

    let credentialPath: string
    try {
      credentialPath = await this.config.persister.persist({
        createdAt: this.now(),
        environment: this.config.environment,
        host: connectionHostOf(target),
        database: request.database,
        username: request.username,
        userHost: request.userHost,
        password: request.password
      })
    } catch (error) {
      this.transition('failed')
      this.logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Failed to save credentials')
      if (error instanceof CredentialWriteError) {
        throw error
      }
      throw new CredentialWriteError('credential file', error instanceof Error ? error.message : String(error))
    }

    this.transition('succeeded')
    this.logger.info({ credentialPath }, 'Provisioning succeeded')
    return { status: 'succeeded', exitCode: 0, credentialPath, request, target }
  }

  private failureSummary (failure: FailureKind, target: ExecutionTarget): string {
    if (target.kind === 'direct') {
      return `Failed to execute MySQL commands on ${target.host}.`
    }
    if (failure === 'container_not_running') {
      return `Docker container '${target.container.name}' is not running.`
    }
    return target.role === 'server'
      ? `Failed to execute MySQL commands in Docker container '${target.container.name}'.`
      : `Failed to execute MySQL commands using Docker container '${target.container.name}'.`
  }

  private expect (state: OrchestratorState, operation: string): void {
    if (this.current !== state) {
      throw new InvalidStateError(operation, this.current)
    }
  }

  private transition (next: OrchestratorState): void {
    this.logger.debug({ from: this.current, to: next }, 'State transition')
    this.current = next
  }
}
