/**
 * One provisioning run from the operator's point of view: gather answers,
 * decide the execution target, run the orchestrator and report.
 */

import { z } from 'zod'
import type { Logger } from 'pino'
import {
  ContainerNotFoundError,
  buildMaskedProvisioningScript,
  maskSecret,
  parseEnvironment,
  toErrorResponse,
  validate,
  validateContainerRef,
  validateDatabaseName,
  validateUserHost,
  validateUsername,
  type ContainerRef,
  type ExecutionTarget
} from '@mysql-provision/shared'
import {
  resolveCredentials,
  withAdminPassword,
  type ConfigLookup,
  type ResolvedCredentials
} from './config/credential-resolver.js'
import { ContainerLocator } from './containers/container-locator.js'
import { MYSQL_CLIENT } from './channels/execution-channel.js'
import { createChannelRegistry } from './channels/channel-factory.js'
import { resolveExecutionTarget } from './channels/execution-target.js'
import { FileCredentialPersister } from './credentials/credential-persister.js'
import {
  ProvisioningOrchestrator,
  type ProvisioningFailure
} from './orchestrator/provisioning-orchestrator.js'
import { isCommandAvailable, type CommandRunner } from './runtime/process-runner.js'
import type { TransientFiles } from './runtime/transient-files.js'
import {
  chooseContainer,
  collectProvisioningRequest,
  promptAdminPassword,
  promptContainerName,
  promptEnvironment,
  type Prompter,
  type RequestPresets
} from './prompts.js'
import { noSpinner, type LogFn, type SpinnerFactory } from './output.js'

export interface ProvisionOptions {
  env?: string
  database?: string
  user?: string
  userHost?: string
  generatePassword?: boolean
  grant?: string
  container?: string
  outputDir: string
  dryRun?: boolean
}

export interface FlowDependencies {
  prompter: Prompter
  runner: CommandRunner
  lookup: ConfigLookup
  logger: Logger
  transientFiles: TransientFiles
  log: LogFn
  startSpinner?: SpinnerFactory
  now?: () => Date
  /** Parent directory for the direct channel's option file */
  tempDir?: string
}

const GrantScopeSchema = z.enum(['full', 'reduced'], {
  errorMap: () => ({ message: "Grant scope must be 'full' or 'reduced'" })
})

/**
 * Validate answers given as flags before asking anything
 */
export function presetsFromOptions (options: ProvisionOptions): RequestPresets {
  return {
    ...(options.database !== undefined ? { database: validateDatabaseName(options.database) } : {}),
    ...(options.user !== undefined ? { username: validateUsername(options.user) } : {}),
    ...(options.userHost !== undefined ? { userHost: validateUserHost(options.userHost) } : {}),
    ...(options.generatePassword ? { passwordMode: 'generate' as const } : {}),
    ...(options.grant !== undefined ? { grant: validate(GrantScopeSchema, options.grant.trim().toLowerCase(), 'grant') } : {})
  }
}

/**
 * Run a provisioning session and return the process exit code
 */
export async function runProvisioning (options: ProvisionOptions, deps: FlowDependencies): Promise<number> {
  const { prompter, runner, logger, log } = deps
  const startSpinner = deps.startSpinner ?? noSpinner

  try {
    const presets = presetsFromOptions(options)
    const locator = new ContainerLocator(runner, logger)

    const clientAvailable = await isCommandAvailable(runner, MYSQL_CLIENT)
    if (!clientAvailable) {
      log('MySQL client not found. Checking for MySQL Docker containers...', 'warning')
    }

    const environment = options.env !== undefined
      ? parseEnvironment(options.env)
      : await promptEnvironment(prompter)

    let resolved = resolveCredentials(environment, deps.lookup, logger)

    const serverContainer = await resolveServerContainer(options, resolved, locator, prompter)

    let clientContainer: ContainerRef | undefined
    if (!serverContainer && !clientAvailable) {
      clientContainer = await findClientContainer(locator, prompter, log)
    }

    if (resolved.needsInteractiveSecret) {
      const shownHost = serverContainer ? 'localhost' : resolved.credentials.host
      resolved = withAdminPassword(resolved, await promptAdminPassword(prompter, resolved.credentials.user, shownHost))
    }

    const target = resolveExecutionTarget({
      credentials: resolved.credentials,
      clientAvailable,
      serverContainer,
      clientContainer
    })

    const request = await collectProvisioningRequest(prompter, presets)

    if (options.dryRun) {
      printDryRun(target, buildMaskedProvisioningScript(request), log)
      return 0
    }

    const channels = createChannelRegistry({
      runner,
      locator,
      transientFiles: deps.transientFiles,
      logger,
      tempDir: deps.tempDir
    })

    const orchestrator = new ProvisioningOrchestrator({
      environment,
      channels,
      persister: new FileCredentialPersister(options.outputDir, logger),
      logger,
      now: deps.now
    })

    const channel = orchestrator.selectChannel(target)
    log(`Attempting to connect to ${channel.describe(target)}...`)

    const spinner = startSpinner('Creating database and user...')
    const result = await orchestrator.provision(request).finally(() => spinner.stop())

    if (result.status === 'failed') {
      reportFailure(result, log)
      return result.exitCode
    }

    log('SUCCESS: Database and user created.', 'success')
    log(`Credentials saved securely to: ${result.credentialPath}`, 'success')
    return result.exitCode
  } catch (error) {
    const response = toErrorResponse(error)
    logger.debug({ code: response.code }, 'Provisioning aborted')
    log(`ERROR: ${response.message}`, 'error')
    if (response.hint) {
      log(response.hint, 'warning')
    }
    return 1
  }
}

async function resolveServerContainer (
  options: ProvisionOptions,
  resolved: ResolvedCredentials,
  locator: ContainerLocator,
  prompter: Prompter
): Promise<ContainerRef | undefined> {
  if (options.container !== undefined && options.container.trim() !== '') {
    return validateContainerRef({ name: options.container })
  }

  if (resolved.containerHint) {
    return resolved.containerHint
  }

  const inDocker = await prompter.confirm('Is MySQL running in Docker?', false)
  if (!inDocker) {
    return undefined
  }

  if (!(await locator.isRuntimeAvailable())) {
    throw new ContainerNotFoundError(
      'Docker is not available on this machine.',
      'Install Docker, or answer no to connect to MySQL directly.'
    )
  }

  const located = await locator.locate(candidates => chooseContainer(prompter, candidates))
  return located.kind === 'selected'
    ? located.ref
    : await promptContainerName(prompter)
}

async function findClientContainer (locator: ContainerLocator, prompter: Prompter, log: LogFn): Promise<ContainerRef | undefined> {
  const located = await locator.locate(candidates => chooseContainer(prompter, candidates))

  if (located.kind === 'none') {
    log('WARNING: MySQL client not found and no MySQL Docker containers detected.', 'warning')
    return undefined
  }

  log(`Found MySQL container: ${located.ref.name}`)
  log('Will use MySQL from Docker container instead of local mysql-client.')
  return located.ref
}

function printDryRun (target: ExecutionTarget, maskedScript: string, log: LogFn): void {
  log('Dry run: nothing will be executed.', 'warning')
  if (target.kind === 'direct') {
    log(`Target: direct connection to ${target.host} as ${target.admin.user} (password ${maskSecret(target.admin.password)})`)
  } else {
    log(`Target: container ${target.container.name} (${target.role}), client connects to ${target.innerHost} as ${target.admin.user} (password ${maskSecret(target.admin.password)})`)
  }
  log('SQL script:')
  log(maskedScript.trimEnd(), 'plain')
}

function reportFailure (result: ProvisioningFailure, log: LogFn): void {
  log(`ERROR: ${result.summary}`, 'error')

  if (result.failure === 'container_not_running') {
    for (const line of result.checklist) {
      log(line, 'warning')
    }
    return
  }

  log('')
  log('Common causes and solutions:', 'plain')
  result.checklist.forEach((cause, index) => {
    log(`${index + 1}. ${cause}`, 'plain')
  })
  log('')
  log('Error details:', 'plain')
  log(result.diagnosticLog.trim() === '' ? 'No detailed error information available' : result.diagnosticLog.trim(), 'plain')
}
