import { describe, it, expect } from 'vitest'
import { program } from './cli.js'

describe('cli', () => {
  it('should have correct name', () => {
    expect(program.name()).toBe('mysql-provision')
  })

  it('should have correct version', () => {
    expect(program.version()).toBe('0.1.0')
  })

  it('should expose the provisioning flags', () => {
    expect(program.options.map(option => option.long)).toEqual([
      '--version',
      '--env',
      '--database',
      '--user',
      '--user-host',
      '--generate-password',
      '--grant',
      '--container',
      '--output-dir',
      '--env-file',
      '--dry-run',
      '--verbose'
    ])
  })

  it('should default the configuration file to .env', () => {
    const envFile = program.options.find(option => option.long === '--env-file')

    expect(envFile?.defaultValue).toBe('.env')
  })
})
