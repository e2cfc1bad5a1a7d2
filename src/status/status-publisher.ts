/**
 * STATUS PUBLISHER
 * ================
 *
 * Owns the single WorkflowStatus of a provisioning run and mirrors it to a JSON
 * file that monitoring services poll (systemd units, fleet dashboards, shell
 * scripts).
 *
 * Every mutation is written to `<path>.tmp` and renamed over `<path>`, so a
 * reader sees either the previous document or the new one, never a partial
 * write. Mutations are synchronous: a progress callback firing from the
 * installation driver cannot interleave with an update from the main flow.
 */

import * as fs from 'fs';
import * as path from 'path';
import _ from 'lodash';
import { ComponentLogger } from '../logging/component-logger';
import type { ProvisioningLogger } from '../logging/provisioning-logger';
import { WorkflowPhase } from './types';
import type { StatusDocument, WorkflowStatus } from './types';

export const DEFAULT_STATUS_FILE = '/var/run/greengrass-provisioning.status';

const DEFAULT_MESSAGES: Record<WorkflowPhase, string> = {
	[WorkflowPhase.STARTING]: 'Service is starting',
	[WorkflowPhase.CHECKING_PROVISIONING]: 'Checking if Greengrass is already provisioned',
	[WorkflowPhase.ALREADY_PROVISIONED]: 'Greengrass is already provisioned',
	[WorkflowPhase.CHECKING_CONNECTIVITY]: 'Checking internet connectivity',
	[WorkflowPhase.NO_CONNECTIVITY]: 'No internet connectivity available',
	[WorkflowPhase.READING_DATABASE]: 'Reading configuration from database',
	[WorkflowPhase.GENERATING_CONFIG]: 'Generating Greengrass configuration',
	[WorkflowPhase.PROVISIONING]: 'Provisioning Greengrass device',
	[WorkflowPhase.COMPLETED]: 'Provisioning completed successfully',
	[WorkflowPhase.ERROR]: 'An error occurred during provisioning',
};

// ERROR is absent: an error keeps the progress reached when it happened
const DEFAULT_PROGRESS: Partial<Record<WorkflowPhase, number>> = {
	[WorkflowPhase.STARTING]: 5,
	[WorkflowPhase.CHECKING_PROVISIONING]: 10,
	[WorkflowPhase.ALREADY_PROVISIONED]: 100,
	[WorkflowPhase.CHECKING_CONNECTIVITY]: 20,
	[WorkflowPhase.NO_CONNECTIVITY]: 20,
	[WorkflowPhase.READING_DATABASE]: 40,
	[WorkflowPhase.GENERATING_CONFIG]: 60,
	[WorkflowPhase.PROVISIONING]: 80,
	[WorkflowPhase.COMPLETED]: 100,
};

export function defaultMessageFor(phase: WorkflowPhase): string {
	return DEFAULT_MESSAGES[phase];
}

/**
 * ISO-8601 UTC with second precision, e.g. 2024-01-15T12:00:00Z
 */
export function formatStatusTimestamp(date: Date): string {
	return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function toStatusDocument(status: WorkflowStatus): StatusDocument {
	return {
		status: status.phase,
		message: status.message,
		timestamp: formatStatusTimestamp(status.timestamp),
		progress_percentage: status.progress,
		...(status.errorDetails ? { error_details: status.errorDetails } : {}),
	};
}

export class StatusPublisher {
	private status: WorkflowStatus;
	private readonly logger: ComponentLogger;

	constructor(
		private readonly statusFilePath: string,
		logger: ProvisioningLogger,
	) {
		this.logger = new ComponentLogger(logger, 'StatusPublisher');

		fs.mkdirSync(path.dirname(statusFilePath), { recursive: true });

		this.status = {
			phase: WorkflowPhase.STARTING,
			message: DEFAULT_MESSAGES[WorkflowPhase.STARTING],
			progress: 0,
			timestamp: new Date(),
		};
		this.publish();
	}

	public getStatusFilePath(): string {
		return this.statusFilePath;
	}

	/**
	 * Move to a phase. Omitted message/progress fall back to the phase defaults;
	 * a supplied progress is clamped into [0, 100].
	 */
	public update(phase: WorkflowPhase, message?: string, progress?: number): void {
		const next: WorkflowStatus = {
			...this.status,
			phase,
			message: message || DEFAULT_MESSAGES[phase],
			timestamp: new Date(),
		};

		if (progress !== undefined && Number.isFinite(progress)) {
			next.progress = Math.round(_.clamp(progress, 0, 100));
		} else {
			next.progress = DEFAULT_PROGRESS[phase] ?? this.status.progress;
		}

		if (phase !== WorkflowPhase.ERROR) {
			delete next.errorDetails;
		}

		this.status = next;
		this.publish();
		this.logger.info(`Status updated: ${phase} - ${next.message}`, { progress: next.progress });
	}

	/**
	 * Enter the ERROR phase. Empty details leave error_details out of the document.
	 */
	public reportError(message: string, details?: string): void {
		this.status = {
			...this.status,
			phase: WorkflowPhase.ERROR,
			message,
			timestamp: new Date(),
		};
		if (details) {
			this.status.errorDetails = details;
		} else {
			delete this.status.errorDetails;
		}

		this.publish();
		this.logger.error(`Error reported: ${message}`, undefined, { details });
	}

	public current(): WorkflowStatus {
		return { ...this.status, timestamp: new Date(this.status.timestamp.getTime()) };
	}

	private publish(): void {
		const tempFile = `${this.statusFilePath}.tmp`;
		const content = `${JSON.stringify(toStatusDocument(this.status), null, 4)}\n`;

		try {
			fs.writeFileSync(tempFile, content, { encoding: 'utf-8', mode: 0o644 });
			// Readable by monitoring services, writable only by us
			fs.chmodSync(tempFile, 0o644);
			fs.renameSync(tempFile, this.statusFilePath);
		} catch (error) {
			// The previous document stays in place; the in-memory status is still current
			this.logger.error('Failed to write status file', error, { path: this.statusFilePath });
			fs.rmSync(tempFile, { force: true, recursive: true });
		}
	}
}
