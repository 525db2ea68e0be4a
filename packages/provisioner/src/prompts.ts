/**
 * Interactive input collection
 * The Prompter interface keeps the question flow independent of inquirer.
 */

import inquirer from 'inquirer'
import type { z } from 'zod'
import { table } from 'table'
import {
  ENVIRONMENTS,
  PasswordSchema,
  DatabaseNameSchema,
  UsernameSchema,
  UserHostSchema,
  generatePassword,
  parseEnvironment,
  validateContainerRef,
  validateSafe,
  type ContainerRef,
  type Environment,
  type ProvisioningRequest
} from '@mysql-provision/shared'
import { selectCandidate } from './containers/container-locator.js'

export type InputValidator = (value: string) => true | string

export interface Choice<T extends string> {
  name: string
  value: T
}

export interface Prompter {
  input (message: string, options?: { default?: string, validate?: InputValidator }): Promise<string>
  secret (message: string, options?: { validate?: InputValidator }): Promise<string>
  confirm (message: string, defaultValue: boolean): Promise<boolean>
  select<T extends string> (message: string, choices: ReadonlyArray<Choice<T>>, defaultValue?: T): Promise<T>
  /** Plain output shown between questions */
  note (message: string): void
}

export class InquirerPrompter implements Prompter {
  async input (message: string, options: { default?: string, validate?: InputValidator } = {}): Promise<string> {
    const { value } = await inquirer.prompt<{ value: string }>([{
      type: 'input',
      name: 'value',
      message,
      default: options.default,
      validate: options.validate
    }])
    return value
  }

  async secret (message: string, options: { validate?: InputValidator } = {}): Promise<string> {
    const { value } = await inquirer.prompt<{ value: string }>([{
      type: 'password',
      name: 'value',
      message,
      mask: '*',
      validate: options.validate
    }])
    return value
  }

  async confirm (message: string, defaultValue: boolean): Promise<boolean> {
    const { value } = await inquirer.prompt<{ value: boolean }>([{
      type: 'confirm',
      name: 'value',
      message,
      default: defaultValue
    }])
    return value
  }

  async select<T extends string> (message: string, choices: ReadonlyArray<Choice<T>>, defaultValue?: T): Promise<T> {
    const { value } = await inquirer.prompt<{ value: T }>([{
      type: 'list',
      name: 'value',
      message,
      choices: choices.map(choice => ({ name: choice.name, value: choice.value })),
      default: defaultValue
    }])
    return value
  }

  note (message: string): void {
    console.log(message)
  }
}

/**
 * Adapt a zod schema to a prompt validator
 */
export function fieldValidator (schema: z.ZodTypeAny): InputValidator {
  return (value) => {
    const result = validateSafe(schema, value)
    return result.success ? true : result.error.message
  }
}

// =============================================================================
// Questions
// =============================================================================

export async function promptEnvironment (prompter: Prompter): Promise<Environment> {
  const answer = await prompter.select(
    'Select environment',
    ENVIRONMENTS.map(env => ({ name: env, value: env })),
    'dev'
  )
  return parseEnvironment(answer)
}

export async function promptAdminPassword (prompter: Prompter, user: string, host: string): Promise<string> {
  return await prompter.secret(`Admin password for ${user}@${host} (input hidden):`)
}

/**
 * Show a numbered pick list and accept a number or a literal name
 */
export async function chooseContainer (prompter: Prompter, candidates: readonly ContainerRef[]): Promise<ContainerRef> {
  prompter.note('Found MySQL containers:')
  prompter.note(table([
    ['#', 'Container'],
    ...candidates.map((candidate, index) => [String(index + 1), candidate.name])
  ]))

  const answer = await prompter.input('Enter container name or number', {
    default: '1',
    validate: value => value.trim() !== '' || 'Container name cannot be empty.'
  })
  return selectCandidate(candidates, answer)
}

export async function promptContainerName (prompter: Prompter): Promise<ContainerRef> {
  const name = await prompter.input('Enter Docker container name:', {
    validate: value => value.trim() !== '' || 'Container name cannot be empty.'
  })
  return validateContainerRef({ name })
}

export type PasswordMode = 'manual' | 'generate'
export type GrantScope = 'full' | 'reduced'

/**
 * Answers supplied up front (command-line flags); prompts are skipped for them
 */
export interface RequestPresets {
  database?: string
  username?: string
  userHost?: string
  passwordMode?: PasswordMode
  grant?: GrantScope
}

export async function collectProvisioningRequest (prompter: Prompter, presets: RequestPresets = {}): Promise<ProvisioningRequest> {
  const database = presets.database ?? await prompter.input('New database name (example: myapp_db):', {
    validate: fieldValidator(DatabaseNameSchema)
  })

  const username = presets.username ?? await prompter.input('New username (example: myapp_user):', {
    validate: fieldValidator(UsernameSchema)
  })

  const userHost = presets.userHost ?? await prompter.input('MySQL user host (%, localhost, or IP):', {
    default: '%',
    validate: fieldValidator(UserHostSchema)
  })

  const passwordMode = presets.passwordMode ?? await prompter.select<PasswordMode>(
    'Password for the new user',
    [
      { name: 'Generate automatically', value: 'generate' },
      { name: 'Enter manually', value: 'manual' }
    ],
    'generate'
  )

  const password = passwordMode === 'generate'
    ? generatePassword()
    : await prompter.secret(`Enter password for ${username}:`, { validate: fieldValidator(PasswordSchema) })

  const grant = presets.grant ?? (await prompter.confirm('Grant FULL (ALL PRIVILEGES) to this user?', true) ? 'full' : 'reduced')

  return {
    database,
    username,
    userHost: userHost === '' ? '%' : userHost,
    password,
    grantFull: grant === 'full'
  }
}
