import pino, { type Logger } from 'pino'
import type { CliSettings } from './config/settings.js'

/**
 * Logger for the CLI. Logs go to stderr so they never mix with prompts.
 */
export function createLogger (settings: Pick<CliSettings, 'LOG_LEVEL' | 'NODE_ENV'>): Logger {
  if (settings.NODE_ENV === 'development') {
    return pino({
      level: settings.LOG_LEVEL,
      name: 'mysql-provision',
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 }
      }
    })
  }

  return pino({
    level: settings.LOG_LEVEL,
    name: 'mysql-provision'
  }, pino.destination(2))
}
