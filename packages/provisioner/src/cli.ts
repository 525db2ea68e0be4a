/**
 * mysql-provision - create a MySQL database and a dedicated user for it
 *
 * Usage:
 *   mysql-provision
 *   mysql-provision --env dev --database myapp_db --user myapp_user --generate-password
 *   mysql-provision --env prod --container mysql-prod --grant reduced --dry-run
 */

import { Command } from 'commander'
import dotenv from 'dotenv'
import { PROVISIONER_VERSION } from '@mysql-provision/shared'
import { loadCliSettings } from './config/settings.js'
import { envLookup } from './config/credential-resolver.js'
import { createLogger } from './logger.js'
import { SpawnCommandRunner } from './runtime/process-runner.js'
import { TransientFiles, installSignalCleanup } from './runtime/transient-files.js'
import { InquirerPrompter } from './prompts.js'
import { log, startSpinner } from './output.js'
import { runProvisioning } from './provision-flow.js'

type CliOptions = {
  env?: string
  database?: string
  user?: string
  userHost?: string
  generatePassword?: boolean
  grant?: string
  container?: string
  outputDir?: string
  envFile: string
  dryRun?: boolean
  verbose?: boolean
}

const program = new Command()

program
  .name('mysql-provision')
  .description('Create a MySQL database and user, and save the new credentials locally')
  .version(PROVISIONER_VERSION)
  .option('-e, --env <environment>', 'Target environment (local, dev, prod)')
  .option('-d, --database <name>', 'Database to create')
  .option('-u, --user <name>', 'User to create')
  .option('--user-host <host>', 'Host part of the new account (%, localhost, or IP)')
  .option('--generate-password', 'Generate the new user\'s password instead of asking')
  .option('--grant <scope>', 'Privileges on the database: full or reduced')
  .option('--container <name>', 'Docker container running the MySQL server')
  .option('--output-dir <dir>', 'Directory for credential files (default: db_credential)')
  .option('--env-file <path>', 'Configuration file to load', '.env')
  .option('--dry-run', 'Print the target and the masked SQL without executing')
  .option('-v, --verbose', 'Enable debug logging')
  .action(async () => {
    const options = program.opts<CliOptions>()

    const loaded = dotenv.config({ path: options.envFile })

    const settings = loadCliSettings()
    const logger = createLogger({
      NODE_ENV: settings.NODE_ENV,
      LOG_LEVEL: options.verbose ? 'debug' : settings.LOG_LEVEL
    })

    if (loaded.error) {
      logger.debug({ envFile: options.envFile, error: loaded.error.message }, 'No configuration file loaded')
    }

    const transientFiles = new TransientFiles()
    const uninstallCleanup = installSignalCleanup(transientFiles, logger)

    try {
      process.exitCode = await runProvisioning({
        env: options.env,
        database: options.database,
        user: options.user,
        userHost: options.userHost,
        generatePassword: options.generatePassword,
        grant: options.grant,
        container: options.container,
        outputDir: options.outputDir ?? settings.CREDENTIAL_DIR,
        dryRun: options.dryRun
      }, {
        prompter: new InquirerPrompter(),
        runner: new SpawnCommandRunner(),
        lookup: envLookup(),
        logger,
        transientFiles,
        log,
        startSpinner
      })
    } finally {
      transientFiles.releaseAllSync()
      uninstallCleanup()
    }
  })

/**
 * Parse argv and run. Exit status is left in process.exitCode.
 */
export async function main (argv: readonly string[] = process.argv): Promise<void> {
  process.on('uncaughtException', (error) => {
    log(`Uncaught exception: ${error.message}`, 'error')
    process.exit(1)
  })

  process.on('unhandledRejection', (reason) => {
    log(`Unhandled rejection: ${String(reason)}`, 'error')
    process.exit(1)
  })

  await program.parseAsync([...argv])
}

export { program }
