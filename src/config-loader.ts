/**
 * Provisioner Configuration Loader
 * ================================
 * Loads configuration from multiple sources with priority:
 * 1. CLI flags - highest priority
 * 2. Environment variables (a .env file is loaded by the CLI before this runs)
 * 3. Default values
 *
 * The merged result is validated; anything unusable is a ConfigurationInvalidError.
 */

import { z } from 'zod';
import { ConfigurationInvalidError } from './errors';
import { DEFAULT_STATUS_FILE } from './status/status-publisher';

export const DEFAULT_LOG_FILE = '/var/log/greengrass-provisioning.log';

const ProvisionerConfigSchema = z.object({
	databasePath: z.string().min(1),
	greengrassPath: z.string().min(1),
	statusFile: z.string().min(1),
	deviceId: z.string().min(1).optional(),
	iotEndpoint: z.string().min(1).optional(),
	dryRun: z.boolean(),
	logLevel: z.enum(['debug', 'info', 'warn', 'error']),
	logFile: z.string().min(1),
	connectivityTimeoutMs: z.number().int().positive(),
	user: z.string().min(1),
	group: z.string().min(1),
	serviceName: z.string().min(1),
	unitDirectory: z.string().min(1),
	javaHome: z.string().min(1).optional(),
});

export type ProvisionerConfig = z.infer<typeof ProvisionerConfigSchema>;

export type ProvisionerOverrides = Partial<ProvisionerConfig>;

/**
 * Values that hold when neither a flag nor an environment variable says otherwise
 */
export const CONFIG_DEFAULTS = {
	statusFile: DEFAULT_STATUS_FILE,
	dryRun: false,
	logLevel: 'info',
	logFile: DEFAULT_LOG_FILE,
	connectivityTimeoutMs: 10000,
	user: 'ggc_user',
	group: 'ggc_group',
	serviceName: 'greengrass',
	unitDirectory: '/etc/systemd/system',
} satisfies ProvisionerOverrides;

export class ConfigLoader {
	private readonly envConfig: Record<string, unknown>;

	constructor(
		private readonly cliConfig: ProvisionerOverrides = {},
		env: NodeJS.ProcessEnv = process.env,
	) {
		this.envConfig = this.loadEnvConfig(env);
	}

	/**
	 * Merged configuration (CLI overrides ENV overrides defaults)
	 */
	public getConfig(): ProvisionerConfig {
		const merged = {
			...CONFIG_DEFAULTS,
			...this.envConfig,
			...withoutUndefined(this.cliConfig),
		};

		const parsed = ProvisionerConfigSchema.safeParse(merged);
		if (!parsed.success) {
			const fields = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))];
			throw new ConfigurationInvalidError(`Invalid configuration: ${fields.join(', ')}`, fields);
		}
		return parsed.data;
	}

	private loadEnvConfig(env: NodeJS.ProcessEnv): Record<string, unknown> {
		return withoutUndefined({
			databasePath: env.DATABASE_PATH,
			greengrassPath: env.GREENGRASS_PATH,
			statusFile: env.STATUS_FILE,
			deviceId: env.DEVICE_ID,
			iotEndpoint: env.IOT_ENDPOINT,
			dryRun: this.parseBoolean(env.TEST_MODE),
			logLevel: env.LOG_LEVEL?.toLowerCase(),
			logFile: env.LOG_FILE,
			connectivityTimeoutMs: this.parseNumber(env.CONNECTIVITY_TIMEOUT_MS),
			user: env.GREENGRASS_USER,
			group: env.GREENGRASS_GROUP,
			javaHome: env.JAVA_HOME,
			unitDirectory: env.SYSTEMD_UNIT_DIR,
		});
	}

	// ========================================================================
	// Helpers
	// ========================================================================

	/**
	 * Unparseable numbers are kept as NaN so validation reports the key
	 */
	private parseNumber(value: string | undefined): number | undefined {
		if (value === undefined || value === '') return undefined;
		return Number(value);
	}

	private parseBoolean(value: string | undefined): boolean | undefined {
		if (value === undefined || value === '') return undefined;
		return value === 'true' || value === '1' || value === 'yes';
	}
}

function withoutUndefined(values: object): Record<string, unknown> {
	return Object.fromEntries(
		Object.entries(values).filter(([, value]) => value !== undefined && value !== ''),
	);
}
