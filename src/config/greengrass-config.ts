/**
 * Renders config/config.yaml for the Greengrass v2 nucleus
 */

import * as path from 'path';
import * as yaml from 'js-yaml';
import type { DeviceIdentityRecord } from '../identity/types';
import type { BundlePaths, GreengrassConfigDocument, NucleusConfiguration } from './types';

export const DEFAULT_NUCLEUS_VERSION = '2.9.0';
export const ROOT_CA_FILENAME = 'root.ca.pem';
export const CONFIG_FILENAME = 'config.yaml';

export function certificateFilename(thingName: string): string {
	return `${thingName}.cert.pem`;
}

export function privateKeyFilename(thingName: string): string {
	return `${thingName}.private.key`;
}

export function bundlePaths(targetRoot: string, thingName: string): BundlePaths {
	const root = path.resolve(targetRoot);
	const configDir = path.join(root, 'config');
	const certsDir = path.join(root, 'certs');
	return {
		configDir,
		certsDir,
		configFilePath: path.join(configDir, CONFIG_FILENAME),
		certificatePath: path.join(certsDir, certificateFilename(thingName)),
		privateKeyPath: path.join(certsDir, privateKeyFilename(thingName)),
		rootCaPath: path.join(certsDir, ROOT_CA_FILENAME),
	};
}

export function buildGreengrassConfig(
	identity: DeviceIdentityRecord,
	targetRoot: string,
): GreengrassConfigDocument {
	const paths = bundlePaths(targetRoot, identity.thingName);

	const configuration: NucleusConfiguration = {
		awsRegion: identity.awsRegion,
		iotRoleAlias: identity.roleAlias,
		iotDataEndpoint: identity.iotDataEndpoint,
		iotCredEndpoint: identity.roleAliasEndpoint,
		...(identity.mqttPort !== undefined ? { mqtt: { port: identity.mqttPort } } : {}),
		...(identity.proxyUrl ? { networkProxy: { proxy: { url: identity.proxyUrl } } } : {}),
		logging: {
			level: 'INFO',
			fileSizeKB: 1024,
			totalLogsSizeKB: 25600,
			format: 'JSON',
		},
	};

	// Only devices assigned to a deployment group poll for deployments
	if (identity.deploymentGroup) {
		configuration.deploymentPollingFrequency = 15;
		configuration.componentStoreMaxSizeBytes = 10737418240;
		configuration.deploymentStatusKeepAliveFrequency = 60;
	}

	return {
		system: {
			certificateFilePath: paths.certificatePath,
			privateKeyPath: paths.privateKeyPath,
			rootCaPath: paths.rootCaPath,
			rootpath: path.resolve(targetRoot),
			thingName: identity.thingName,
		},
		services: {
			'aws.greengrass.Nucleus': {
				version: identity.agentVersion || DEFAULT_NUCLEUS_VERSION,
				configuration,
			},
		},
	};
}

export function renderGreengrassConfig(document: GreengrassConfigDocument): string {
	return `---\n${yaml.dump(document, { lineWidth: -1, noRefs: true })}`;
}
