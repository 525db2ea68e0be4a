/**
 * Container Locator
 * Finds running MySQL/MariaDB containers through the docker CLI and resolves
 * which one to use when there is more than one.
 */

import type { Logger } from 'pino'
import type { ContainerRef } from '@mysql-provision/shared'
import { isCommandAvailable, type CommandRunner } from '../runtime/process-runner.js'

export const CONTAINER_RUNTIME = 'docker'

/**
 * Name fragments that mark a container as a MySQL server or client host
 */
export const CONTAINER_NAME_TOKENS = ['mysql', 'mariadb'] as const

export type LocateResult =
  | { kind: 'none' }
  | { kind: 'selected', ref: ContainerRef, automatic: boolean }

/**
 * Picks one of several candidates, typically by asking the operator
 */
export type CandidateChooser = (candidates: readonly ContainerRef[]) => Promise<ContainerRef>

export function matchesMysqlName (name: string): boolean {
  const lower = name.toLowerCase()
  return CONTAINER_NAME_TOKENS.some(token => lower.includes(token))
}

/**
 * Resolve the operator's answer to a 1-indexed pick list.
 * Empty input picks the first candidate, an in-range number picks by
 * position, and anything else (out-of-range numbers included) is taken as
 * a literal container name that is only checked when it is used.
 */
export function selectCandidate (candidates: readonly ContainerRef[], input: string): ContainerRef {
  const answer = input.trim()

  if (answer === '') {
    const first = candidates[0]
    if (first) {
      return first
    }
  }

  if (/^\d+$/.test(answer)) {
    const picked = candidates[Number(answer) - 1]
    if (picked) {
      return picked
    }
  }

  return { name: answer }
}

export class ContainerLocator {
  private readonly logger: Logger

  constructor (
    private readonly runner: CommandRunner,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'container-locator' })
  }

  isRuntimeAvailable (): Promise<boolean> {
    return isCommandAvailable(this.runner, CONTAINER_RUNTIME)
  }

  /**
   * Running containers whose name looks like MySQL, in runtime order.
   * Each call issues one fresh query.
   */
  async listCandidates (): Promise<ContainerRef[]> {
    const names = await this.runningContainerNames()
    const candidates = names.filter(matchesMysqlName).map(name => ({ name }))
    this.logger.debug({ candidates: candidates.map(c => c.name) }, 'Listed MySQL container candidates')
    return candidates
  }

  /**
   * Auto-select a single candidate, ask `choose` when there are several
   */
  async locate (choose: CandidateChooser): Promise<LocateResult> {
    const candidates = await this.listCandidates()

    const only = candidates.length === 1 ? candidates[0] : undefined
    if (only) {
      this.logger.info({ container: only.name }, 'Auto-selected the only MySQL container')
      return { kind: 'selected', ref: only, automatic: true }
    }

    if (candidates.length === 0) {
      return { kind: 'none' }
    }

    const ref = await choose(candidates)
    this.logger.info({ container: ref.name }, 'Container selected')
    return { kind: 'selected', ref, automatic: false }
  }

  /**
   * Point-in-time liveness check; call right before executing on `ref`
   */
  async validateRunning (ref: ContainerRef): Promise<boolean> {
    const names = await this.runningContainerNames()
    const running = names.includes(ref.name)
    this.logger.debug({ container: ref.name, running }, 'Checked container status')
    return running
  }

  private async runningContainerNames (): Promise<string[]> {
    const result = await this.runner.run(CONTAINER_RUNTIME, ['ps', '--format', '{{.Names}}'])

    if (result.error || result.exitCode !== 0) {
      this.logger.debug({ exitCode: result.exitCode, error: result.error?.message, stderr: result.stderr.trim() }, 'Container runtime query failed')
      return []
    }

    return result.stdout
      .split('\n')
      .map(line => line.trim())
      .filter(line => line.length > 0)
  }
}
