/**
 * Logging Module
 */

export * from './types';
export { ProvisioningLogger, isLogLevel } from './provisioning-logger';
export { ComponentLogger } from './component-logger';
export { ConsoleLogBackend } from './console-backend';
export { FileLogBackend } from './file-backend';
export type { FileLogBackendOptions } from './file-backend';
