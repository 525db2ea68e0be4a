import { z } from 'zod'
import { validate } from '@mysql-provision/shared'

/**
 * Process-level settings read from the environment after dotenv has loaded
 */
export const CliSettingsSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
  NODE_ENV: z.string().optional(),
  CREDENTIAL_DIR: z.string().min(1).default('db_credential')
})

export type CliSettings = z.infer<typeof CliSettingsSchema>

export function loadCliSettings (env: NodeJS.ProcessEnv = process.env): CliSettings {
  return validate(CliSettingsSchema, {
    LOG_LEVEL: env.LOG_LEVEL || undefined,
    NODE_ENV: env.NODE_ENV || undefined,
    CREDENTIAL_DIR: env.CREDENTIAL_DIR || undefined
  }, 'Invalid settings')
}
