import os from 'os'
import path from 'path'
import { existsSync } from 'fs'
import { mkdtemp, readFile, rm } from 'fs/promises'
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import pino from 'pino'
import { runProvisioning, type FlowDependencies, type ProvisionOptions } from './provision-flow.js'
import { envLookup } from './config/credential-resolver.js'
import { TransientFiles } from './runtime/transient-files.js'
import type { LogType } from './output.js'
import { FakeCommandRunner, exited, ok, withRunningContainers } from './test-support/fake-runner.js'
import { ScriptedPrompter, type Answer } from './test-support/scripted-prompter.js'

describe('runProvisioning', () => {
  let root: string
  let outputDir: string
  let lines: Array<{ message: string, type: LogType }>

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'provision-flow-test-'))
    outputDir = path.join(root, 'db_credential')
    lines = []
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  function deps (runner: FakeCommandRunner, config: Record<string, string>, answers: Record<string, Answer>): FlowDependencies {
    return {
      prompter: new ScriptedPrompter(answers),
      runner,
      lookup: envLookup(config),
      logger: pino({ level: 'silent' }),
      transientFiles: new TransientFiles(),
      log: (message, type = 'info') => { lines.push({ message, type }) },
      now: () => new Date('2026-10-18T09:30:15Z'),
      tempDir: root
    }
  }

  const options = (overrides: Partial<ProvisionOptions> = {}): ProvisionOptions => ({
    env: 'dev',
    database: 'myapp_db',
    user: 'myapp_user',
    userHost: '%',
    generatePassword: true,
    grant: 'full',
    outputDir,
    ...overrides
  })

  const messages = () => lines.map(line => line.message)

  it('should provision over a direct connection and save credentials', async () => {
    const runner = new FakeCommandRunner().on('mysql', [], ok())

    const code = await runProvisioning(options(), deps(runner, {
      DEV_MYSQL_HOST: 'db.internal',
      DEV_ADMIN_PASS: 'test-secret'
    }, { 'Is MySQL running in Docker?': false }))

    expect(code).toBe(0)
    expect(messages()).toEqual([
      'Attempting to connect to MySQL server at db.internal...',
      'SUCCESS: Database and user created.',
      `Credentials saved securely to: ${path.join(outputDir, 'myapp_db_dev.cred')}`
    ])

    const content = (await readFile(path.join(outputDir, 'myapp_db_dev.cred'), 'utf8')).split('\n')
    expect(content.slice(0, 6)).toEqual([
      '# created: 2026-10-18T09:30:15Z',
      'environment: dev',
      'mysql_host: db.internal',
      'database: myapp_db',
      'user: myapp_user',
      'user_host: %'
    ])
    expect(content[6]).toMatch(/^password: [0-9a-f]{32}$/)

    const script = runner.calls[1]?.options.input ?? ''
    expect(script.split('\n')[0]).toBe('CREATE DATABASE IF NOT EXISTS `myapp_db` CHARACTER SET utf8mb4 COLLATE utf8mb4_general_ci;')
  })

  it('should run inside the configured server container', async () => {
    const runner = withRunningContainers(new FakeCommandRunner(), ['mysql-dev'])
      .on('docker', ['exec'], ok())

    const code = await runProvisioning(options(), deps(runner, {
      DEV_ADMIN_PASS: 'test-secret',
      DEV_DOCKER_CONTAINER: 'mysql-dev'
    }, {}))

    expect(code).toBe(0)
    expect(messages()[0]).toBe('MySQL client not found. Checking for MySQL Docker containers...')
    expect(messages()[1]).toBe('Attempting to connect to MySQL in Docker container: mysql-dev...')

    const exec = runner.calls.find(call => call.args[0] === 'exec')
    expect(exec?.args).toEqual(['exec', '-i', '-e', 'MYSQL_PWD', 'mysql-dev', 'mysql', '-h', 'localhost', '-u', 'root'])
    expect(exec?.options.env).toEqual({ MYSQL_PWD: 'test-secret' })

    const content = await readFile(path.join(outputDir, 'myapp_db_dev.cred'), 'utf8')
    expect(content.split('\n')[2]).toBe('mysql_host: localhost')
  })

  it('should borrow a client container when mysql is missing', async () => {
    const runner = withRunningContainers(new FakeCommandRunner(), ['web', 'mysql-tools'])
      .on('docker', ['exec'], ok())

    const code = await runProvisioning(options(), deps(runner, {
      DEV_MYSQL_HOST: 'db.internal',
      DEV_ADMIN_PASS: 'test-secret'
    }, { 'Is MySQL running in Docker?': false }))

    expect(code).toBe(0)
    expect(messages().slice(0, 4)).toEqual([
      'MySQL client not found. Checking for MySQL Docker containers...',
      'Found MySQL container: mysql-tools',
      'Will use MySQL from Docker container instead of local mysql-client.',
      'Attempting to connect to MySQL server at db.internal using Docker container: mysql-tools...'
    ])
    const exec = runner.calls.find(call => call.args[0] === 'exec')
    expect(exec?.args.slice(-4)).toEqual(['-h', 'db.internal', '-u', 'root'])
  })

  it('should stop when there is neither a client nor a container', async () => {
    const runner = withRunningContainers(new FakeCommandRunner(), ['web'])

    const code = await runProvisioning(options(), deps(runner, { DEV_ADMIN_PASS: 'test-secret' }, {
      'Is MySQL running in Docker?': false
    }))

    expect(code).toBe(1)
    expect(lines.slice(-3)).toEqual([
      { message: 'WARNING: MySQL client not found and no MySQL Docker containers detected.', type: 'warning' },
      { message: 'ERROR: MySQL client not found and no MySQL Docker containers detected.', type: 'error' },
      { message: 'Install mysql-client or start a MySQL Docker container.', type: 'warning' }
    ])
    expect(existsSync(outputDir)).toBe(false)
  })

  it('should print the checklist and write nothing when the client fails', async () => {
    const runner = new FakeCommandRunner()
      .on('mysql', [], exited(1, "ERROR 1045 (28000): Access denied for user 'root'@'10.0.0.2'\n"))
      .on('mysql', ['--version'], ok())

    const code = await runProvisioning(options(), deps(runner, { DEV_ADMIN_PASS: 'test-secret' }, {
      'Is MySQL running in Docker?': false
    }))

    expect(code).toBe(1)
    expect(messages()).toContain('ERROR: Failed to execute MySQL commands on 127.0.0.1.')
    expect(messages()).toContain('1. Authentication failed - Check your password')
    expect(messages().slice(-2)).toEqual([
      'Error details:',
      "ERROR 1045 (28000): Access denied for user 'root'@'10.0.0.2'"
    ])
    expect(existsSync(outputDir)).toBe(false)
  })

  it('should use the container named by the flag, trimmed', async () => {
    const runner = withRunningContainers(new FakeCommandRunner(), ['mysql-dev'])
      .on('docker', ['exec'], ok())

    const code = await runProvisioning(options({ container: ' mysql-dev ' }), deps(runner, { DEV_ADMIN_PASS: 'test-secret' }, {}))

    expect(code).toBe(0)
    const exec = runner.calls.find(call => call.args[0] === 'exec')
    expect(exec?.args[4]).toBe('mysql-dev')
  })

  it('should tell the operator to start a stopped container', async () => {
    const runner = withRunningContainers(new FakeCommandRunner(), [])

    const code = await runProvisioning(options({ container: 'mysql-dev' }), deps(runner, { DEV_ADMIN_PASS: 'test-secret' }, {}))

    expect(code).toBe(1)
    expect(messages().slice(-2)).toEqual([
      "ERROR: Docker container 'mysql-dev' is not running.",
      'Please start the container first: docker start mysql-dev'
    ])
    expect(runner.calls.some(call => call.args[0] === 'exec')).toBe(false)
  })

  it('should ask for a missing admin password', async () => {
    const runner = new FakeCommandRunner().on('mysql', [], ok())

    const code = await runProvisioning(options(), deps(runner, {}, {
      'Is MySQL running in Docker?': false,
      'Admin password for root@127.0.0.1 (input hidden):': 'test-secret'
    }))

    expect(code).toBe(0)
    const optionArg = runner.calls[1]?.args[0] ?? ''
    expect(optionArg.startsWith('--defaults-extra-file=')).toBe(true)
  })

  it('should print the masked script on a dry run', async () => {
    const runner = new FakeCommandRunner().on('mysql', [], ok())

    const code = await runProvisioning(options({ dryRun: true }), deps(runner, { DEV_ADMIN_PASS: 'test-secret' }, {
      'Is MySQL running in Docker?': false
    }))

    expect(code).toBe(0)
    expect(runner.calls).toHaveLength(1)
    expect(messages()[1]).toBe('Target: direct connection to 127.0.0.1 as root (password ********)')
    expect(messages()[3]).toContain("IDENTIFIED BY '********';")
    expect(existsSync(outputDir)).toBe(false)
  })

  it('should refuse a user name that would add a line to the credential file', async () => {
    const runner = new FakeCommandRunner().on('mysql', [], ok())

    const code = await runProvisioning(options({ user: 'shop\npassword: forged' }), deps(runner, { DEV_ADMIN_PASS: 'test-secret' }, {
      'Is MySQL running in Docker?': false
    }))

    expect(code).toBe(1)
    expect(messages()).toEqual(['ERROR: Username cannot contain control characters.'])
    expect(runner.calls).toHaveLength(0)
    expect(existsSync(outputDir)).toBe(false)
  })

  it('should reject an invalid grant flag before asking anything', async () => {
    const runner = new FakeCommandRunner()
    const prompter = new ScriptedPrompter({})

    const code = await runProvisioning(options({ grant: 'partial' }), { ...deps(runner, {}, {}), prompter })

    expect(code).toBe(1)
    expect(messages()).toEqual(["ERROR: grant: Grant scope must be 'full' or 'reduced'"])
    expect(prompter.asked).toEqual([])
    expect(runner.calls).toHaveLength(0)
  })
})
