import {
  ChannelNotFoundError,
  type ExecutionTargetKind
} from '@mysql-provision/shared'
import type { ExecutionChannel, ExecutionChannelFactory } from './execution-channel.js'

/**
 * Manages registration and creation of execution channels per target kind
 */
export class ExecutionChannelRegistry {
  private factories = new Map<ExecutionTargetKind, ExecutionChannelFactory>()

  /**
   * Register a channel factory for a target kind
   */
  register (kind: ExecutionTargetKind, factory: ExecutionChannelFactory): void {
    this.factories.set(kind, factory)
  }

  /**
   * Create a channel for a target kind
   * @throws {ChannelNotFoundError} If nothing is registered for the kind
   */
  create (kind: ExecutionTargetKind): ExecutionChannel {
    const factory = this.factories.get(kind)
    if (!factory) {
      throw new ChannelNotFoundError(kind)
    }
    return factory()
  }

  getSupportedKinds (): ExecutionTargetKind[] {
    return Array.from(this.factories.keys())
  }

  isSupported (kind: ExecutionTargetKind): boolean {
    return this.factories.has(kind)
  }
}
