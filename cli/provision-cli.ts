#!/usr/bin/env node

/**
 * Greengrass Provisioner CLI
 *
 * Usage:
 *   greengrass-provisioner -d /opt/config/devices.db -g /greengrass/v2
 *   greengrass-provisioner check -g /greengrass/v2
 *   greengrass-provisioner list-devices -d /opt/config/devices.db
 *
 * Exit codes: 0 provisioned (now or already), 1 failure, 2 no connectivity.
 */

import * as fs from 'fs';
import * as dotenv from 'dotenv';
import yargs from 'yargs';
import type { Argv } from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ConfigLoader } from '../src/config-loader';
import type { ProvisionerConfig } from '../src/config-loader';
import { ConfigurationInvalidError, errorMessage } from '../src/errors';
import { ProvisioningLogger, ConsoleLogBackend, FileLogBackend } from '../src/logging';
import type { LogLevel } from '../src/logging';
import { StatusPublisher } from '../src/status/status-publisher';
import { ConnectivityProbe, normalizeEndpoint } from '../src/network/connectivity-probe';
import { DeviceIdentityStore } from '../src/identity/identity-store';
import { ConfigMaterializer } from '../src/config/config-materializer';
import { ProvisioningStateDetector } from '../src/provisioning/state-detector';
import { InstallationDriver } from '../src/provisioning/installation-driver';
import { collectDeviceIdentifiers } from '../src/lib/device-identifier';
import { ExitCode, ProvisioningWorkflow } from '../src/workflow';

// Load environment variables
dotenv.config();

function createLogger(level: LogLevel, logFile?: string): ProvisioningLogger {
	const logger = new ProvisioningLogger([new ConsoleLogBackend()], level);
	if (logFile) {
		try {
			logger.addBackend(new FileLogBackend({ filename: logFile }));
		} catch (error) {
			logger.warn(`File logging disabled: ${errorMessage(error)}`, { logFile });
		}
	}
	return logger;
}

function assertExists(target: string, kind: 'file' | 'directory', key: string): void {
	let stat: fs.Stats;
	try {
		stat = fs.statSync(target);
	} catch {
		throw new ConfigurationInvalidError(`${key} does not exist: ${target}`, [key]);
	}
	if (kind === 'file' ? !stat.isFile() : !stat.isDirectory()) {
		throw new ConfigurationInvalidError(`${key} is not a ${kind}: ${target}`, [key]);
	}
}

// ============================================================================
// OPTIONS
// ============================================================================

function databaseOption<T>(args: Argv<T>) {
	return args.option('database-path', {
		alias: 'd',
		description: 'Path to the configuration database',
		type: 'string',
	});
}

function greengrassOption<T>(args: Argv<T>) {
	return args.option('greengrass-path', {
		alias: 'g',
		description: 'Path where Greengrass will be set up',
		type: 'string',
	});
}

function provisionOptions<T>(args: Argv<T>) {
	return greengrassOption(databaseOption(args))
		.option('status-file', {
			alias: 's',
			description: 'Path to the status file',
			type: 'string',
		})
		.option('device-id', {
			description: 'Device id to look up (default: hardware identifiers, then "default")',
			type: 'string',
		})
		.option('iot-endpoint', {
			description: 'Single endpoint that replaces the connectivity candidate list',
			type: 'string',
		})
		.option('dry-run', {
			description: 'Skip account, download and service manager side effects',
			type: 'boolean',
		})
		.option('log-file', {
			description: 'Rotating log file',
			type: 'string',
		});
}

// ============================================================================
// COMMANDS
// ============================================================================

interface ProvisionArgs {
	databasePath?: string;
	greengrassPath?: string;
	statusFile?: string;
	deviceId?: string;
	iotEndpoint?: string;
	dryRun?: boolean;
	logFile?: string;
	verbose?: boolean;
}

async function provision(args: ProvisionArgs): Promise<ExitCode> {
	const config: ProvisionerConfig = new ConfigLoader({
		databasePath: args.databasePath,
		greengrassPath: args.greengrassPath,
		statusFile: args.statusFile,
		deviceId: args.deviceId,
		iotEndpoint: args.iotEndpoint,
		dryRun: args.dryRun,
		logFile: args.logFile,
		logLevel: args.verbose ? 'debug' : undefined,
	}).getConfig();

	assertExists(config.databasePath, 'file', 'databasePath');
	assertExists(config.greengrassPath, 'directory', 'greengrassPath');

	const logger = createLogger(config.logLevel, config.logFile);
	try {
		logger.info('AWS Greengrass Provisioning Service starting...');
		logger.debug('Configuration', { ...config });

		const status = new StatusPublisher(config.statusFile, logger);
		const endpointOverride = config.iotEndpoint
			? normalizeEndpoint(config.iotEndpoint, config.dryRun)
			: undefined;

		const workflow = new ProvisioningWorkflow(
			{ greengrassPath: config.greengrassPath, deviceId: config.deviceId },
			{
				status,
				detector: new ProvisioningStateDetector(logger),
				probe: new ConnectivityProbe({ endpointOverride, timeoutMs: config.connectivityTimeoutMs }, logger),
				store: new DeviceIdentityStore(config.databasePath, logger),
				materializer: new ConfigMaterializer(logger),
				createDriver: (identity) => new InstallationDriver({
					installationRoot: config.greengrassPath,
					agentVersion: identity.agentVersion,
					user: config.user,
					group: config.group,
					serviceName: config.serviceName,
					unitDirectory: config.unitDirectory,
					javaHome: config.javaHome,
					dryRun: config.dryRun,
				}, logger),
				collectIdentifiers: () => collectDeviceIdentifiers(),
			},
			logger,
		);

		const outcome = await workflow.run();
		logger.info(`Provisioning finished: ${outcome.phase}`, { exitCode: outcome.exitCode });
		return outcome.exitCode;
	} finally {
		await logger.close();
	}
}

async function check(args: { greengrassPath?: string; verbose?: boolean }): Promise<ExitCode> {
	const greengrassPath = args.greengrassPath ?? process.env.GREENGRASS_PATH;
	if (!greengrassPath) {
		throw new ConfigurationInvalidError('greengrassPath is required', ['greengrassPath']);
	}

	// stdout carries the JSON document
	const logger = createLogger(args.verbose ? 'debug' : 'warn');
	try {
		const state = await new ProvisioningStateDetector(logger).detect(greengrassPath);
		console.log(JSON.stringify(state, null, 2));
		return state.isProvisioned ? ExitCode.Success : ExitCode.Failure;
	} finally {
		await logger.close();
	}
}

async function listDevices(args: { databasePath?: string; verbose?: boolean }): Promise<ExitCode> {
	const databasePath = args.databasePath ?? process.env.DATABASE_PATH;
	if (!databasePath) {
		throw new ConfigurationInvalidError('databasePath is required', ['databasePath']);
	}

	const logger = createLogger(args.verbose ? 'debug' : 'warn');
	const store = new DeviceIdentityStore(databasePath, logger);
	try {
		await store.connect();
		for (const id of await store.listIds()) {
			console.log(id);
		}
		return ExitCode.Success;
	} finally {
		await store.disconnect();
		await logger.close();
	}
}

// ============================================================================
// MAIN
// ============================================================================

async function main(): Promise<ExitCode> {
	let exitCode = ExitCode.Failure;

	await yargs(hideBin(process.argv))
		.scriptName('greengrass-provisioner')
		.usage('AWS Greengrass Provisioning Service\n\nUsage: $0 [command] [options]')
		.option('verbose', {
			alias: 'v',
			description: 'Enable verbose logging',
			type: 'boolean',
			global: true,
		})
		.command('$0', 'Provision this device into AWS IoT Greengrass', provisionOptions, async (argv) => {
			exitCode = await provision(argv);
		})
		.command('check', 'Print the provisioning state of a Greengrass root as JSON', greengrassOption, async (argv) => {
			exitCode = await check(argv);
		})
		.command('list-devices', 'List the device ids in the configuration database', databaseOption, async (argv) => {
			exitCode = await listDevices(argv);
		})
		.example('$0 -d /opt/config/devices.db -g /greengrass/v2', 'Provision using the device database')
		.strict()
		.help()
		.parseAsync();

	return exitCode;
}

if (require.main === module) {
	main()
		.then((code) => {
			process.exitCode = code;
		})
		.catch((error: unknown) => {
			console.error('Fatal error:', errorMessage(error));
			process.exitCode = ExitCode.Failure;
		});
}

export { main };
