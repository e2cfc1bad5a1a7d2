/**
 * Configuration bundle module
 */

export * from './types';
export { ConfigMaterializer, GREENGRASS_DIRECTORIES } from './config-materializer';
export {
	DEFAULT_NUCLEUS_VERSION,
	bundlePaths,
	buildGreengrassConfig,
	renderGreengrassConfig,
} from './greengrass-config';
