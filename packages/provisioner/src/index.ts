export * from './runtime/process-runner.js'
export * from './runtime/transient-files.js'
export * from './config/credential-resolver.js'
export * from './config/settings.js'
export * from './containers/container-locator.js'
export * from './channels/execution-channel.js'
export * from './channels/direct-channel.js'
export * from './channels/containerized-channel.js'
export * from './channels/channel-registry.js'
export * from './channels/channel-factory.js'
export * from './channels/execution-target.js'
export * from './credentials/credential-persister.js'
export * from './orchestrator/provisioning-orchestrator.js'
export * from './prompts.js'
export * from './provision-flow.js'
export { createLogger } from './logger.js'
