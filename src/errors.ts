/**
 * Provisioning Errors
 * ===================
 *
 * Every failure that ends the workflow is one of these. The orchestrator turns
 * them into a terminal ERROR status; none of them is retried.
 */

export type ProvisioningErrorKind =
	| 'ConfigurationInvalid'
	| 'ConnectivityFailure'
	| 'IdentityNotFound'
	| 'IdentityStoreFailure'
	| 'MaterializationFailure'
	| 'InstallationFailure';

export class ProvisioningError extends Error {
	constructor(
		public readonly kind: ProvisioningErrorKind,
		message: string,
	) {
		super(message);
		this.name = 'ProvisioningError';
	}
}

export class ConfigurationInvalidError extends ProvisioningError {
	constructor(message: string, public readonly fields: string[] = []) {
		super('ConfigurationInvalid', message);
		this.name = 'ConfigurationInvalidError';
	}
}

export class ConnectivityFailureError extends ProvisioningError {
	constructor(message: string) {
		super('ConnectivityFailure', message);
		this.name = 'ConnectivityFailureError';
	}
}

export class IdentityNotFoundError extends ProvisioningError {
	constructor(public readonly triedKeys: string[]) {
		super('IdentityNotFound', `No device configuration found in database (tried: ${triedKeys.join(', ')})`);
		this.name = 'IdentityNotFoundError';
	}
}

export class IdentityStoreError extends ProvisioningError {
	constructor(message: string) {
		super('IdentityStoreFailure', message);
		this.name = 'IdentityStoreError';
	}
}

export class MaterializationFailureError extends ProvisioningError {
	constructor(message: string) {
		super('MaterializationFailure', `Failed to generate configuration: ${message}`);
		this.name = 'MaterializationFailureError';
	}
}

export class InstallationFailureError extends ProvisioningError {
	constructor(message: string, public readonly step?: string) {
		super('InstallationFailure', `Provisioning failed: ${message}`);
		this.name = 'InstallationFailureError';
	}
}

/**
 * Message text of anything thrown
 */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
