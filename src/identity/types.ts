/**
 * Device identity types
 *
 * Identity records are entered out-of-band into the device database and are
 * only ever read by the provisioner.
 */

import { z } from 'zod';

export interface DeviceIdentityRecord {
	readonly deviceId: string;
	readonly thingName: string;
	readonly iotDataEndpoint: string;
	readonly awsRegion: string;
	/** Inline PEM, or a path to a PEM file (resolved when materializing) */
	readonly rootCaMaterial: string;
	readonly certificatePem: string;
	readonly privateKeyPem: string;
	readonly roleAlias: string;
	readonly roleAliasEndpoint: string;

	readonly agentVersion?: string;
	readonly deploymentGroup?: string;
	readonly initialComponents: readonly string[];
	readonly proxyUrl?: string;
	readonly mqttPort?: number;
	readonly customDomain?: string;
}

/**
 * device_config table row
 */
export interface DeviceConfigRow {
	device_id: string;
	thing_name: string | null;
	iot_endpoint: string | null;
	aws_region: string | null;
	root_ca_path: string | null;
	certificate_pem: string | null;
	private_key_pem: string | null;
	role_alias: string | null;
	role_alias_endpoint: string | null;
	nucleus_version: string | null;
	deployment_group: string | null;
	initial_components: string | null;
	proxy_url: string | null;
	mqtt_port: number | null;
	custom_domain: string | null;
}

/**
 * device_identifiers table row (physical identifier -> device_id alias)
 */
export interface DeviceIdentifierRow {
	device_id: string;
	mac_address: string | null;
	serial_number: string | null;
}

const requiredText = z.string().trim().min(1);

/**
 * A record is usable only when every required field is non-empty
 */
export const UsableIdentitySchema = z.object({
	deviceId: requiredText,
	thingName: requiredText,
	iotDataEndpoint: requiredText,
	awsRegion: requiredText,
	rootCaMaterial: requiredText,
	certificatePem: requiredText,
	privateKeyPem: requiredText,
	roleAlias: requiredText,
	roleAliasEndpoint: requiredText,
	agentVersion: z.string().optional(),
	deploymentGroup: z.string().optional(),
	initialComponents: z.array(z.string()),
	proxyUrl: z.string().optional(),
	mqttPort: z.number().int().min(1).max(65535).optional(),
	customDomain: z.string().optional(),
});

export type IdentityValidation =
	| { valid: true }
	| { valid: false; fields: string[] };

export function validateIdentityRecord(record: DeviceIdentityRecord): IdentityValidation {
	const parsed = UsableIdentitySchema.safeParse(record);
	if (parsed.success) {
		return { valid: true };
	}
	const fields = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))];
	return { valid: false, fields };
}

/**
 * "a,b,,c" -> ['a', 'b', 'c']
 */
export function parseComponentList(value: string | null | undefined): string[] {
	if (!value) {
		return [];
	}
	return value
		.split(',')
		.map((segment) => segment.trim())
		.filter((segment) => segment.length > 0);
}

function optionalText(value: string | null): string | undefined {
	return value === null || value === '' ? undefined : value;
}

export function rowToIdentityRecord(row: DeviceConfigRow): DeviceIdentityRecord {
	return {
		deviceId: row.device_id,
		thingName: row.thing_name ?? '',
		iotDataEndpoint: row.iot_endpoint ?? '',
		awsRegion: row.aws_region ?? '',
		rootCaMaterial: row.root_ca_path ?? '',
		certificatePem: row.certificate_pem ?? '',
		privateKeyPem: row.private_key_pem ?? '',
		roleAlias: row.role_alias ?? '',
		roleAliasEndpoint: row.role_alias_endpoint ?? '',
		agentVersion: optionalText(row.nucleus_version),
		deploymentGroup: optionalText(row.deployment_group),
		initialComponents: parseComponentList(row.initial_components),
		proxyUrl: optionalText(row.proxy_url),
		mqttPort: row.mqtt_port ?? undefined,
		customDomain: optionalText(row.custom_domain),
	};
}
