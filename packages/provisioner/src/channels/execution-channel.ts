import type {
  ExecutionOutcome,
  ExecutionTarget,
  ExecutionTargetKind
} from '@mysql-provision/shared'

/**
 * Runs a SQL script against a target and reports how it went.
 * Failures are returned in the outcome, never thrown.
 */
export interface ExecutionChannel {
  readonly kind: ExecutionTargetKind

  execute (target: ExecutionTarget, script: string): Promise<ExecutionOutcome>

  /** One-line description for progress output */
  describe (target: ExecutionTarget): string

  /** Likely causes printed when execution fails */
  troubleshooting (target: ExecutionTarget): string[]
}

export type ExecutionChannelFactory = () => ExecutionChannel

export const MYSQL_CLIENT = 'mysql'

export function failedOutcome (diagnosticLog: string, failure: ExecutionOutcome['failure'] = 'execution_failed'): ExecutionOutcome {
  return { success: false, diagnosticLog, failure }
}

export function succeededOutcome (diagnosticLog: string = ''): ExecutionOutcome {
  return { success: true, diagnosticLog }
}

/**
 * Diagnostic text from a finished client process
 */
export function diagnosticsOf (result: { stderr: string, error?: Error, exitCode: number | null }): string {
  const parts = [result.stderr.trim()]
  if (result.error) {
    parts.push(result.error.message)
  }
  if (result.exitCode !== null && result.exitCode !== 0 && parts.every((p): boolean => p === '')) {
    parts.push(`Client exited with code ${result.exitCode}`)
  }
  return parts.filter(p => p !== '').join('\n')
}
