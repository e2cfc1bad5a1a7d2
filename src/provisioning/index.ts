/**
 * Provisioning Module
 */

export * from './types';
export { ProvisioningStateDetector, CONFIG_VARIANTS } from './state-detector';
export { InstallationDriver, DEFAULT_DOWNLOAD_BASE_URL } from './installation-driver';
export type { InstallationDriverOptions } from './installation-driver';
export { renderServiceUnit, nucleusJarPath, unitFileName } from './service-unit';
export type { ServiceUnitOptions } from './service-unit';
