import { z } from 'zod'

// =============================================================================
// Core Types and Schemas
// =============================================================================

/**
 * Configuration namespace the admin credentials are read from
 */
export const EnvironmentSchema = z.enum(['local', 'dev', 'prod'])
export type Environment = z.infer<typeof EnvironmentSchema>

export const ENVIRONMENTS: readonly Environment[] = EnvironmentSchema.options

/**
 * Pre-existing privileged account used to perform provisioning
 * An empty password means it has to be collected interactively
 */
export const AdminCredentialsSchema = z.object({
  host: z.string().min(1, 'Host is required'),
  user: z.string().min(1, 'Admin user is required'),
  password: z.string()
})

export type AdminCredentials = z.infer<typeof AdminCredentialsSchema>

/**
 * Running container, discovered or named by the operator
 */
export const ContainerRefSchema = z.object({
  name: z.string().trim().min(1, 'Container name is required')
})

export type ContainerRef = z.infer<typeof ContainerRefSchema>

// =============================================================================
// Execution Targets
// =============================================================================

export const DirectTargetSchema = z.object({
  kind: z.literal('direct'),
  host: z.string().min(1),
  admin: AdminCredentialsSchema
})

/**
 * `server` runs the client inside the MySQL server's own container,
 * `client` borrows a container only for its mysql binary
 */
export const ContainerRoleSchema = z.enum(['server', 'client'])
export type ContainerRole = z.infer<typeof ContainerRoleSchema>

export const ContainerizedTargetSchema = z.object({
  kind: z.literal('containerized'),
  container: ContainerRefSchema,
  admin: AdminCredentialsSchema,
  innerHost: z.string().min(1),
  role: ContainerRoleSchema
})

export const ExecutionTargetSchema = z.discriminatedUnion('kind', [
  DirectTargetSchema,
  ContainerizedTargetSchema
])

export type DirectTarget = Readonly<z.infer<typeof DirectTargetSchema>>
export type ContainerizedTarget = Readonly<z.infer<typeof ContainerizedTargetSchema>>
export type ExecutionTarget = DirectTarget | ContainerizedTarget
export type ExecutionTargetKind = ExecutionTarget['kind']

// =============================================================================
// Provisioning
// =============================================================================

/**
 * Characters that cannot appear in a secret stored in the credential file
 */
export const FORBIDDEN_PASSWORD_CHARACTERS = /[\\/]/

/**
 * Credential file fields are one per line, so no field may carry CR, LF or
 * any other control character
 */
export const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/

export const DatabaseNameSchema = z.string()
  .min(1, 'Database name cannot be empty.')
  .max(64, 'Database name must be at most 64 characters.')
  .regex(/^[^/\\.]+$/, "Database name cannot contain '/', '\\' or '.'.")
  .refine(value => !CONTROL_CHARACTERS.test(value), 'Database name cannot contain control characters.')

export const UsernameSchema = z.string()
  .min(1, 'Username cannot be empty.')
  .refine(value => !CONTROL_CHARACTERS.test(value), 'Username cannot contain control characters.')

export const UserHostSchema = z.string()
  .min(1, 'Host cannot be empty.')
  .max(255, 'Host must be at most 255 characters.')
  .refine(value => !CONTROL_CHARACTERS.test(value), 'Host cannot contain control characters.')

export const PasswordSchema = z.string()
  .min(1, 'Password cannot be empty.')
  .refine(value => !FORBIDDEN_PASSWORD_CHARACTERS.test(value), "Password cannot contain '/' or '\\'.")
  .refine(value => !CONTROL_CHARACTERS.test(value), 'Password cannot contain control characters.')

export const ProvisioningRequestSchema = z.object({
  database: DatabaseNameSchema,
  username: UsernameSchema,
  userHost: UserHostSchema.default('%'),
  password: PasswordSchema,
  grantFull: z.boolean()
})

export type ProvisioningRequest = z.infer<typeof ProvisioningRequestSchema>
export type ProvisioningRequestInput = z.input<typeof ProvisioningRequestSchema>

/**
 * Privileges granted on `database`.* when full access is declined
 */
export const REDUCED_PRIVILEGES = [
  'SELECT',
  'INSERT',
  'UPDATE',
  'DELETE',
  'CREATE',
  'DROP',
  'INDEX',
  'ALTER'
] as const

export type ReducedPrivilege = typeof REDUCED_PRIVILEGES[number]

// =============================================================================
// Execution Results
// =============================================================================

export const FailureKindSchema = z.enum(['container_not_running', 'execution_failed'])
export type FailureKind = z.infer<typeof FailureKindSchema>

/**
 * Channel-agnostic result of running a script
 */
export interface ExecutionOutcome {
  success: boolean
  diagnosticLog: string
  failure?: FailureKind
}

/**
 * Contents of the persisted credential artifact
 */
export const CredentialRecordSchema = z.object({
  createdAt: z.date(),
  environment: EnvironmentSchema,
  host: z.string().min(1).refine(value => !CONTROL_CHARACTERS.test(value), 'Host cannot contain control characters.'),
  database: DatabaseNameSchema,
  username: UsernameSchema,
  userHost: UserHostSchema,
  password: PasswordSchema
})

export type CredentialRecord = z.infer<typeof CredentialRecordSchema>
