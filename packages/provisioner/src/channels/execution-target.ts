import {
  ClientUnavailableError,
  type AdminCredentials,
  type ContainerRef,
  type ContainerizedTarget,
  type DirectTarget,
  type ExecutionTarget
} from '@mysql-provision/shared'

export interface TargetResolutionInput {
  credentials: AdminCredentials
  /** The mysql client binary can be run locally */
  clientAvailable: boolean
  /** Container the MySQL server itself runs in */
  serverContainer?: ContainerRef
  /** Container found to borrow a mysql client from */
  clientContainer?: ContainerRef
}

/**
 * Decide once how the script reaches the server:
 *
 * 1. the server's own container, addressing it as localhost from inside;
 * 2. without a local client, a client container addressing the configured host;
 * 3. the local client over the network;
 * 4. otherwise there is no way to run the client.
 */
export function resolveExecutionTarget (input: TargetResolutionInput): ExecutionTarget {
  const admin = { ...input.credentials }

  if (input.serverContainer) {
    const target: ContainerizedTarget = {
      kind: 'containerized',
      container: { ...input.serverContainer },
      admin,
      innerHost: 'localhost',
      role: 'server'
    }
    return Object.freeze(target)
  }

  if (!input.clientAvailable && input.clientContainer) {
    const target: ContainerizedTarget = {
      kind: 'containerized',
      container: { ...input.clientContainer },
      admin,
      innerHost: admin.host,
      role: 'client'
    }
    return Object.freeze(target)
  }

  if (input.clientAvailable) {
    const target: DirectTarget = {
      kind: 'direct',
      host: admin.host,
      admin
    }
    return Object.freeze(target)
  }

  throw new ClientUnavailableError()
}

/**
 * Host the new credentials are recorded against
 */
export function connectionHostOf (target: ExecutionTarget): string {
  return target.kind === 'direct' ? target.host : target.innerHost
}
