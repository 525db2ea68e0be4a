import os from 'os'
import path from 'path'
import { mkdtemp, readFile, rm, stat, writeFile, chmod } from 'fs/promises'
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import pino from 'pino'
import { CredentialWriteError, ValidationError, type CredentialRecord } from '@mysql-provision/shared'
import {
  FileCredentialPersister,
  credentialFileName,
  formatCreatedAt,
  renderCredentialFile
} from './credential-persister.js'

const record: CredentialRecord = {
  createdAt: new Date('2026-10-18T09:30:15.123Z'),
  environment: 'dev',
  host: '127.0.0.1',
  database: 'myapp_db',
  username: 'myapp_user',
  userHost: '%',
  password: 'test-secret'
}

const EXPECTED_CONTENT = [
  '# created: 2026-10-18T09:30:15Z',
  'environment: dev',
  'mysql_host: 127.0.0.1',
  'database: myapp_db',
  'user: myapp_user',
  'user_host: %',
  'password: test-secret',
  ''
].join('\n')

describe('credential file format', () => {
  it('should name files by database and environment', () => {
    expect(credentialFileName('myapp_db', 'prod')).toBe('myapp_db_prod.cred')
  })

  it('should drop milliseconds from the timestamp', () => {
    expect(formatCreatedAt(record.createdAt)).toBe('2026-10-18T09:30:15Z')
  })

  it('should render one field per line', () => {
    expect(renderCredentialFile(record)).toBe(EXPECTED_CONTENT)
  })
})

describe('FileCredentialPersister', () => {
  let root: string
  const logger = pino({ level: 'silent' })

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'credential-persister-test-'))
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('should create the directory and a private file', async () => {
    const dir = path.join(root, 'db_credential')
    const file = await new FileCredentialPersister(dir, logger).persist(record)

    expect(file).toBe(path.join(dir, 'myapp_db_dev.cred'))
    expect(await readFile(file, 'utf8')).toBe(EXPECTED_CONTENT)
    expect((await stat(file)).mode & 0o777).toBe(0o600)
    expect((await stat(dir)).mode & 0o777).toBe(0o700)
  })

  it('should overwrite an existing file and tighten its mode', async () => {
    const persister = new FileCredentialPersister(root, logger)
    const file = path.join(root, 'myapp_db_dev.cred')
    await writeFile(file, 'stale')
    await chmod(file, 0o644)

    await persister.persist({ ...record, password: 'test-secret-2' })

    const content = await readFile(file, 'utf8')
    expect(content.split('\n')[6]).toBe('password: test-secret-2')
    expect((await stat(file)).mode & 0o777).toBe(0o600)
  })

  it('should validate the record before writing', async () => {
    await expect(new FileCredentialPersister(root, logger).persist({ ...record, database: '' }))
      .rejects.toThrow(ValidationError)
  })

  it('should refuse fields with line breaks', async () => {
    await expect(new FileCredentialPersister(root, logger).persist({ ...record, host: 'db\npassword: forged' }))
      .rejects.toThrow('Invalid credential record: Host cannot contain control characters.')
    await expect(new FileCredentialPersister(root, logger).persist({ ...record, userHost: '%\nuser: forged' }))
      .rejects.toThrow(ValidationError)
  })

  it('should wrap filesystem failures', async () => {
    const blocker = path.join(root, 'not-a-dir')
    await writeFile(blocker, '')

    await expect(new FileCredentialPersister(blocker, logger).persist(record))
      .rejects.toThrow(CredentialWriteError)
  })
})
