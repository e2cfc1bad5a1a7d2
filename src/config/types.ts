/**
 * Configuration bundle types
 */

/**
 * Outcome of one materialization. Paths are absolute; a failed run carries
 * only the reason.
 */
export type ConfigBundle =
	| {
		success: true;
		configFilePath: string;
		certificatePath: string;
		privateKeyPath: string;
		rootCaPath: string;
	}
	| {
		success: false;
		error: string;
	};

export interface BundlePaths {
	configDir: string;
	certsDir: string;
	configFilePath: string;
	certificatePath: string;
	privateKeyPath: string;
	rootCaPath: string;
}

/**
 * Shape of config/config.yaml as the nucleus reads it
 */
export interface GreengrassConfigDocument {
	system: {
		certificateFilePath: string;
		privateKeyPath: string;
		rootCaPath: string;
		rootpath: string;
		thingName: string;
	};
	services: {
		'aws.greengrass.Nucleus': {
			version: string;
			configuration: NucleusConfiguration;
		};
	};
}

export interface NucleusConfiguration {
	awsRegion: string;
	iotRoleAlias: string;
	iotDataEndpoint: string;
	iotCredEndpoint: string;
	mqtt?: { port: number };
	networkProxy?: { proxy: { url: string } };
	logging: {
		level: string;
		fileSizeKB: number;
		totalLogsSizeKB: number;
		format: string;
	};
	deploymentPollingFrequency?: number;
	componentStoreMaxSizeBytes?: number;
	deploymentStatusKeepAliveFrequency?: number;
}
