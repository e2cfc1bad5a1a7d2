/**
 * Unit tests for ConfigLoader
 */

import { ConfigLoader, DEFAULT_LOG_FILE } from '../../src/config-loader';
import { ConfigurationInvalidError } from '../../src/errors';

const REQUIRED_ENV = {
	DATABASE_PATH: '/opt/config/devices.db',
	GREENGRASS_PATH: '/greengrass/v2',
};

describe('ConfigLoader', () => {
	it('should apply defaults', () => {
		const config = new ConfigLoader({}, REQUIRED_ENV).getConfig();

		expect(config).toEqual({
			databasePath: '/opt/config/devices.db',
			greengrassPath: '/greengrass/v2',
			statusFile: '/var/run/greengrass-provisioning.status',
			dryRun: false,
			logLevel: 'info',
			logFile: DEFAULT_LOG_FILE,
			connectivityTimeoutMs: 10000,
			user: 'ggc_user',
			group: 'ggc_group',
			serviceName: 'greengrass',
			unitDirectory: '/etc/systemd/system',
		});
	});

	it('should read environment variables', () => {
		const config = new ConfigLoader({}, {
			...REQUIRED_ENV,
			TEST_MODE: 'true',
			IOT_ENDPOINT: 'mock-iot:8443',
			STATUS_FILE: '/tmp/status.json',
			DEVICE_ID: 'device-42',
			LOG_LEVEL: 'DEBUG',
			CONNECTIVITY_TIMEOUT_MS: '2500',
			GREENGRASS_USER: 'gg',
			GREENGRASS_GROUP: 'gg',
			JAVA_HOME: '/opt/java',
			SYSTEMD_UNIT_DIR: '/run/systemd/system',
		}).getConfig();

		expect(config.dryRun).toBe(true);
		expect(config.iotEndpoint).toBe('mock-iot:8443');
		expect(config.statusFile).toBe('/tmp/status.json');
		expect(config.deviceId).toBe('device-42');
		expect(config.logLevel).toBe('debug');
		expect(config.connectivityTimeoutMs).toBe(2500);
		expect(config.user).toBe('gg');
		expect(config.group).toBe('gg');
		expect(config.javaHome).toBe('/opt/java');
		expect(config.unitDirectory).toBe('/run/systemd/system');
	});

	it('should let CLI flags override environment variables', () => {
		const config = new ConfigLoader(
			{ greengrassPath: '/data/greengrass', dryRun: false, deviceId: undefined },
			{ ...REQUIRED_ENV, TEST_MODE: 'true', DEVICE_ID: 'from-env' },
		).getConfig();

		expect(config.greengrassPath).toBe('/data/greengrass');
		expect(config.dryRun).toBe(false);
		expect(config.deviceId).toBe('from-env');
	});

	it('should treat empty environment values as unset', () => {
		const config = new ConfigLoader({}, { ...REQUIRED_ENV, IOT_ENDPOINT: '', TEST_MODE: '' }).getConfig();

		expect(config.iotEndpoint).toBeUndefined();
		expect(config.dryRun).toBe(false);
	});

	it('should name missing required settings', () => {
		expect(() => new ConfigLoader({}, {}).getConfig()).toThrow(
			new ConfigurationInvalidError('Invalid configuration: databasePath, greengrassPath'),
		);
	});

	it('should reject an unparseable timeout', () => {
		let caught: unknown;
		try {
			new ConfigLoader({}, { ...REQUIRED_ENV, CONNECTIVITY_TIMEOUT_MS: 'soon' }).getConfig();
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(ConfigurationInvalidError);
		expect(caught instanceof ConfigurationInvalidError && caught.fields).toEqual(['connectivityTimeoutMs']);
	});

	it('should reject an unknown log level', () => {
		expect(() => new ConfigLoader({}, { ...REQUIRED_ENV, LOG_LEVEL: 'verbose' }).getConfig()).toThrow(
			'Invalid configuration: logLevel',
		);
	});
});
