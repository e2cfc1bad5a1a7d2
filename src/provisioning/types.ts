/**
 * Provisioning types
 */

/**
 * What the installation root says about enrollment. Computed on demand.
 */
export type ProvisioningState =
	| {
		isProvisioned: false;
		missingComponents: string[];
		details: string;
	}
	| {
		isProvisioned: true;
		thingName: string;
		agentVersion: string;
		configFilePath: string;
		missingComponents: [];
		details: string;
	};

/**
 * Installation steps, in execution order
 */
export enum InstallationStep {
	Initializing = 'Initializing',
	AcquiringAgent = 'AcquiringAgent',
	InstallingAgent = 'InstallingAgent',
	RegisteringService = 'RegisteringService',
	StartingService = 'StartingService',
	VerifyingConnection = 'VerifyingConnection',
	Completed = 'Completed',
}

export type InstallationResult =
	| {
		success: true;
		lastCompletedStep: InstallationStep.Completed;
		serviceName: string;
	}
	| {
		success: false;
		/** Absent when the first step failed */
		lastCompletedStep?: InstallationStep;
		failedStep: InstallationStep;
		error: string;
	};

/**
 * Receives each step before its side effect runs
 */
export type ProgressCallback = (step: InstallationStep, percentage: number, message: string) => void;
