/**
 * Child process execution used by the execution channels and the container
 * locator. Everything goes through the CommandRunner interface so the
 * channels can be driven by an in-process stand-in.
 */

import { spawn } from 'child_process'

export interface RunOptions {
  /** Written to the child's stdin, which is then closed */
  input?: string
  /** Merged over process.env for this child only */
  env?: Record<string, string>
}

export interface CommandResult {
  exitCode: number | null
  stdout: string
  stderr: string
  /** Set when the process could not be spawned (e.g. ENOENT) */
  error?: Error
}

export interface CommandRunner {
  run (command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>
}

export class SpawnCommandRunner implements CommandRunner {
  run (command: string, args: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    return new Promise((resolve) => {
      let stdout = ''
      let stderr = ''
      let settled = false

      const finish = (result: CommandResult) => {
        if (!settled) {
          settled = true
          resolve(result)
        }
      }

      const proc = spawn(command, [...args], {
        stdio: ['pipe', 'pipe', 'pipe'],
        env: options.env ? { ...process.env, ...options.env } : process.env
      })

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString()
      })

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString()
      })

      // EPIPE when the child exits before reading its input
      proc.stdin.on('error', (error: Error) => {
        stderr += `${error.message}\n`
      })

      proc.on('error', (error) => {
        finish({ exitCode: null, stdout, stderr, error })
      })

      proc.on('close', (code) => {
        finish({ exitCode: code, stdout, stderr })
      })

      if (options.input !== undefined) {
        proc.stdin.write(options.input)
      }
      proc.stdin.end()
    })
  }
}

/**
 * True when `<command> --version` can be spawned and exits cleanly
 */
export async function isCommandAvailable (runner: CommandRunner, command: string): Promise<boolean> {
  const result = await runner.run(command, ['--version'])
  return result.error === undefined && result.exitCode === 0
}
