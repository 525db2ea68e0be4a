import chalk from 'chalk'
import ora from 'ora'

export type LogType = 'info' | 'success' | 'error' | 'warning' | 'plain'

export type LogFn = (message: string, type?: LogType) => void

export interface Spinner {
  stop (): void
}

export type SpinnerFactory = (text: string) => Spinner

const colors = {
  info: chalk.blue,
  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,
  plain: (message: string) => message
}

export const log: LogFn = (message, type = 'info') => {
  console.log(colors[type](message))
}

export const startSpinner: SpinnerFactory = (text) => ora(text).start()

export const noSpinner: SpinnerFactory = () => ({ stop: () => {} })
