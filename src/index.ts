/**
 * Greengrass device provisioner
 */

export * from './errors';
export * from './logging';
export * from './status';
export * from './network';
export * from './identity';
export * from './config';
export * from './provisioning';
export { ExecCommandRunner, formatCommand, DEFAULT_COMMAND_TIMEOUT_MS } from './lib/command-runner';
export type { CommandOptions, CommandResult, CommandRunner } from './lib/command-runner';
export { collectDeviceIdentifiers } from './lib/device-identifier';
export type { DeviceIdentifierOptions } from './lib/device-identifier';
export { ConfigLoader, CONFIG_DEFAULTS, DEFAULT_LOG_FILE } from './config-loader';
export type { ProvisionerConfig, ProvisionerOverrides } from './config-loader';
export { ProvisioningWorkflow, ExitCode, DEFAULT_DEVICE_ID, mapDriverProgress } from './workflow';
export type { WorkflowDependencies, WorkflowOptions, WorkflowOutcome } from './workflow';
