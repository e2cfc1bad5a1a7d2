/**
 * PROVISIONING WORKFLOW
 * =====================
 *
 * One provisioning run, start to finish:
 *
 *   CHECKING_PROVISIONING  -> already enrolled?        (ALREADY_PROVISIONED, exit 0)
 *   CHECKING_CONNECTIVITY  -> cloud reachable?         (NO_CONNECTIVITY, exit 2)
 *   READING_DATABASE       -> identity record for this device
 *   GENERATING_CONFIG      -> credentials + config.yaml on disk
 *   PROVISIONING           -> installation driver (progress 80-99)
 *   COMPLETED              -> exit 0
 *
 * Any error ends the run in ERROR with exit code 1.
 */

import _ from 'lodash';
import { ComponentLogger } from './logging/component-logger';
import type { ProvisioningLogger } from './logging/provisioning-logger';
import {
	ConfigurationInvalidError,
	IdentityNotFoundError,
	InstallationFailureError,
	MaterializationFailureError,
	errorMessage,
} from './errors';
import { WorkflowPhase } from './status/types';
import type { StatusPublisher } from './status/status-publisher';
import type { ConnectivityProbe } from './network/connectivity-probe';
import type { DeviceIdentityStore } from './identity/identity-store';
import { validateIdentityRecord } from './identity/types';
import type { DeviceIdentityRecord } from './identity/types';
import type { ConfigMaterializer } from './config/config-materializer';
import type { ProvisioningStateDetector } from './provisioning/state-detector';
import type { InstallationDriver } from './provisioning/installation-driver';

export const DEFAULT_DEVICE_ID = 'default';

export enum ExitCode {
	Success = 0,
	Failure = 1,
	NoConnectivity = 2,
}

export interface WorkflowOutcome {
	exitCode: ExitCode;
	phase: WorkflowPhase;
}

export interface WorkflowDependencies {
	status: StatusPublisher;
	detector: ProvisioningStateDetector;
	probe: ConnectivityProbe;
	store: DeviceIdentityStore;
	materializer: ConfigMaterializer;
	/** Built per run: the agent version comes from the identity record */
	createDriver: (identity: DeviceIdentityRecord) => InstallationDriver;
	/** Physical identifiers of this device, most specific first */
	collectIdentifiers: () => Promise<string[]>;
}

export interface WorkflowOptions {
	greengrassPath: string;
	deviceId?: string;
}

const PROVISIONING_PROGRESS_START = 80;
const PROVISIONING_PROGRESS_SPAN = 19;

export class ProvisioningWorkflow {
	private readonly logger: ComponentLogger;

	constructor(
		private readonly options: WorkflowOptions,
		private readonly deps: WorkflowDependencies,
		logger: ProvisioningLogger,
	) {
		this.logger = new ComponentLogger(logger, 'ProvisioningWorkflow');
	}

	public async run(): Promise<WorkflowOutcome> {
		this.logger.info('Greengrass provisioning starting...', { greengrassPath: this.options.greengrassPath });

		try {
			return await this.execute();
		} catch (error) {
			this.logger.error('Fatal error', error);
			this.deps.status.reportError('Provisioning failed', errorMessage(error));
			return { exitCode: ExitCode.Failure, phase: WorkflowPhase.ERROR };
		} finally {
			await this.deps.store.disconnect().catch((error: unknown) => {
				this.logger.warn('Failed to close database', { error: errorMessage(error) });
			});
		}
	}

	private async execute(): Promise<WorkflowOutcome> {
		const { status, detector, probe, store, materializer } = this.deps;

		// 1. Already provisioned?
		status.update(WorkflowPhase.CHECKING_PROVISIONING);
		const state = await detector.detect(this.options.greengrassPath);
		if (state.isProvisioned) {
			this.logger.info(`Greengrass is already provisioned for thing: ${state.thingName}`);
			status.update(WorkflowPhase.ALREADY_PROVISIONED, `Already provisioned as ${state.thingName}`);
			return { exitCode: ExitCode.Success, phase: WorkflowPhase.ALREADY_PROVISIONED };
		}

		// 2. Connectivity
		status.update(WorkflowPhase.CHECKING_CONNECTIVITY);
		const connectivity = await probe.probe();
		if (!connectivity.isConnected) {
			this.logger.error(`No internet connectivity: ${connectivity.error ?? 'unknown reason'}`);
			status.update(WorkflowPhase.NO_CONNECTIVITY, connectivity.error);
			return { exitCode: ExitCode.NoConnectivity, phase: WorkflowPhase.NO_CONNECTIVITY };
		}

		// 3. Identity record
		status.update(WorkflowPhase.READING_DATABASE);
		await store.connect();
		const identity = await this.resolveIdentity();
		this.logger.info(`Found configuration for device: ${identity.deviceId} (Thing: ${identity.thingName})`);

		const validation = validateIdentityRecord(identity);
		if (!validation.valid) {
			throw new ConfigurationInvalidError(
				`Device configuration for ${identity.deviceId} is incomplete: ${validation.fields.join(', ')}`,
				validation.fields,
			);
		}

		// 4. Configuration bundle
		status.update(WorkflowPhase.GENERATING_CONFIG);
		const bundle = await materializer.materialize(identity, this.options.greengrassPath);
		if (!bundle.success) {
			throw new MaterializationFailureError(bundle.error);
		}

		// 5. Installation
		status.update(WorkflowPhase.PROVISIONING);
		const driver = this.deps.createDriver(identity);
		const result = await driver.run((step, percentage, message) => {
			this.logger.debug(`Installation step: ${step}`, { percentage });
			status.update(WorkflowPhase.PROVISIONING, message, mapDriverProgress(percentage));
		});
		if (!result.success) {
			throw new InstallationFailureError(result.error, result.failedStep);
		}

		status.update(WorkflowPhase.COMPLETED, 'Greengrass provisioning completed successfully', 100);
		this.logger.info('Greengrass provisioning completed successfully!');
		return { exitCode: ExitCode.Success, phase: WorkflowPhase.COMPLETED };
	}

	/**
	 * Configured device id, then each physical identifier, then the shared
	 * "default" record
	 */
	private async resolveIdentity(): Promise<DeviceIdentityRecord> {
		const { store } = this.deps;
		const tried: string[] = [];

		if (this.options.deviceId) {
			tried.push(this.options.deviceId);
			this.logger.info(`Looking up configuration for device: ${this.options.deviceId}`);
			const record = await store.lookupById(this.options.deviceId);
			if (record) {
				return record;
			}
		}

		for (const identifier of await this.deps.collectIdentifiers()) {
			tried.push(identifier);
			this.logger.info(`Looking up configuration for identifier: ${identifier}`);
			const record = await store.lookupByIdentifier(identifier);
			if (record) {
				return record;
			}
		}

		tried.push(DEFAULT_DEVICE_ID);
		const fallback = await store.lookupById(DEFAULT_DEVICE_ID);
		if (fallback) {
			this.logger.info('Using default device configuration');
			return fallback;
		}

		throw new IdentityNotFoundError(tried);
	}
}

/**
 * Driver progress 0-100 onto the PROVISIONING band 80-99, so COMPLETED is the
 * only 100 and published progress never goes backwards
 */
export function mapDriverProgress(percentage: number): number {
	const bounded = _.clamp(percentage, 0, 100);
	return PROVISIONING_PROGRESS_START + Math.floor((bounded * PROVISIONING_PROGRESS_SPAN) / 100);
}
