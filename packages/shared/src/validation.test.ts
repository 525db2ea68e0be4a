import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import { ValidationError } from './errors.js'
import {
  validate,
  validateSafe,
  validateDatabaseName,
  validateUsername,
  validateUserHost,
  validatePassword,
  validateProvisioningRequest,
  parseEnvironment,
  environmentKeyPrefix
} from './validation.js'

describe('validate', () => {
  const schema = z.object({ name: z.string().min(1, 'Name is required') })

  it('should return parsed data', () => {
    expect(validate(schema, { name: 'app' })).toEqual({ name: 'app' })
  })

  it('should throw ValidationError with context and field', () => {
    try {
      validate(schema, { name: '' }, 'Invalid thing')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError)
      if (error instanceof ValidationError) {
        expect(error.message).toBe('Invalid thing: Name is required')
        expect(error.field).toBe('name')
      }
    }
  })

  it('should return a result object from validateSafe', () => {
    const result = validateSafe(schema, { name: '' })

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.message).toBe('Name is required')
    }
  })
})

describe('field validators', () => {
  it('should reject an empty database name', () => {
    expect(() => validateDatabaseName('')).toThrow('Database name cannot be empty.')
  })

  it('should reject path characters in database names', () => {
    expect(() => validateDatabaseName('../etc')).toThrow("Database name cannot contain '/', '\\' or '.'.")
    expect(() => validateDatabaseName('a.b')).toThrow(ValidationError)
  })

  it('should accept quotes and backticks in database names', () => {
    expect(validateDatabaseName('we`ird\'db')).toBe('we`ird\'db')
  })

  it('should reject an empty username', () => {
    expect(() => validateUsername('')).toThrow('Username cannot be empty.')
  })

  it('should reject line breaks and other control characters', () => {
    expect(() => validateUsername('shop\npassword: x')).toThrow('Username cannot contain control characters.')
    expect(() => validateUserHost('%\r')).toThrow('Host cannot contain control characters.')
    expect(() => validateDatabaseName('shop\ndb')).toThrow('Database name cannot contain control characters.')
    expect(() => validatePassword('test\tsecret')).toThrow('Password cannot contain control characters.')
    expect(() => validateUsername('shop\u007f')).toThrow(ValidationError)
  })

  it('should accept usernames longer than 32 characters', () => {
    const name = 'u'.repeat(40)

    expect(validateUsername(name)).toBe(name)
  })

  it('should reject slashes in passwords', () => {
    expect(() => validatePassword('abc/def')).toThrow("Password cannot contain '/' or '\\'.")
    expect(() => validatePassword('abc\\def')).toThrow(ValidationError)
    expect(validatePassword("it's")).toBe("it's")
  })
})

describe('validateProvisioningRequest', () => {
  it('should default the user host to %', () => {
    const request = validateProvisioningRequest({
      database: 'app_db',
      username: 'app_user',
      password: 'test-secret',
      grantFull: true
    })

    expect(request.userHost).toBe('%')
  })

  it('should prefix the context', () => {
    expect(() => validateProvisioningRequest({
      database: 'app_db',
      username: '',
      password: 'test-secret',
      grantFull: true
    })).toThrow('Invalid provisioning request: Username cannot be empty.')
  })
})

describe('parseEnvironment', () => {
  it('should default empty input to dev', () => {
    expect(parseEnvironment('')).toBe('dev')
    expect(parseEnvironment(undefined)).toBe('dev')
  })

  it('should be case-insensitive and accept production', () => {
    expect(parseEnvironment(' LOCAL ')).toBe('local')
    expect(parseEnvironment('Production')).toBe('prod')
  })

  it('should reject unknown environments', () => {
    expect(() => parseEnvironment('staging')).toThrow('Please enter local, dev, or prod.')
  })

  it('should derive the configuration key prefix', () => {
    expect(environmentKeyPrefix('prod')).toBe('PROD')
  })
})
