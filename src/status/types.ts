/**
 * Workflow status types
 */

export enum WorkflowPhase {
	STARTING = 'STARTING',
	CHECKING_PROVISIONING = 'CHECKING_PROVISIONING',
	ALREADY_PROVISIONED = 'ALREADY_PROVISIONED',
	CHECKING_CONNECTIVITY = 'CHECKING_CONNECTIVITY',
	NO_CONNECTIVITY = 'NO_CONNECTIVITY',
	READING_DATABASE = 'READING_DATABASE',
	GENERATING_CONFIG = 'GENERATING_CONFIG',
	PROVISIONING = 'PROVISIONING',
	COMPLETED = 'COMPLETED',
	ERROR = 'ERROR',
}

export interface WorkflowStatus {
	phase: WorkflowPhase;
	message: string;
	/** 0-100 */
	progress: number;
	timestamp: Date;
	/** Only set while in the ERROR phase */
	errorDetails?: string;
}

/**
 * Document written to the status file for external monitors
 */
export interface StatusDocument {
	status: WorkflowPhase;
	message: string;
	timestamp: string;
	progress_percentage: number;
	error_details?: string;
}
