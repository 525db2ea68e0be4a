import type { CommandResult, CommandRunner, RunOptions } from '../runtime/process-runner.js'

export interface RecordedCall {
  command: string
  args: string[]
  options: RunOptions
}

type Responder = (call: RecordedCall) => CommandResult | Promise<CommandResult>

/**
 * In-process CommandRunner. Responses are matched on the command and a
 * prefix of its arguments; the latest matching registration wins. Anything
 * unmatched behaves like a missing binary.
 */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCall[] = []
  private readonly routes: Array<{ command: string, prefix: string[], respond: Responder }> = []

  on (command: string, prefix: string[], response: CommandResult | Responder): this {
    const respond: Responder = typeof response === 'function' ? response : () => response
    this.routes.push({ command, prefix, respond })
    return this
  }

  async run (command: string, args: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    const call: RecordedCall = { command, args: [...args], options }
    this.calls.push(call)

    for (let i = this.routes.length - 1; i >= 0; i--) {
      const route = this.routes[i]
      if (route && route.command === command && route.prefix.every((arg, index) => args[index] === arg)) {
        return await route.respond(call)
      }
    }

    return notFound(command)
  }

  callsTo (command: string): RecordedCall[] {
    return this.calls.filter(call => call.command === command)
  }
}

export function ok (stdout: string = ''): CommandResult {
  return { exitCode: 0, stdout, stderr: '' }
}

export function exited (exitCode: number, stderr: string = ''): CommandResult {
  return { exitCode, stdout: '', stderr }
}

export function notFound (command: string): CommandResult {
  return { exitCode: null, stdout: '', stderr: '', error: new Error(`spawn ${command} ENOENT`) }
}

/**
 * `docker ps` listing the given container names
 */
export function withRunningContainers (runner: FakeCommandRunner, names: string[]): FakeCommandRunner {
  return runner
    .on('docker', ['--version'], ok('Docker version 27.0.0'))
    .on('docker', ['ps'], ok(names.map(name => `${name}\n`).join('')))
}
