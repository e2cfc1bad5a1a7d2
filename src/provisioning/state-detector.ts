/**
 * PROVISIONING STATE DETECTOR
 * ===========================
 *
 * Decides from the filesystem alone whether the device is already enrolled.
 * A root counts as provisioned when it has:
 *
 * - config:       config/config.yaml, config.yml or config.json
 * - certificates: certs/ with a certificate file and a private key file
 * - ggc-root:     the ggc-root/ directory
 *
 * and the first config variant found parses into a usable configuration.
 * Nothing under the root is modified.
 */

import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ComponentLogger } from '../logging/component-logger';
import type { ProvisioningLogger } from '../logging/provisioning-logger';
import { errorMessage } from '../errors';
import type { ProvisioningState } from './types';

export const CONFIG_VARIANTS = ['config.yaml', 'config.yml', 'config.json'] as const;

const CERTIFICATE_MARKERS = ['.cert.pem', '.crt'];
const PRIVATE_KEY_MARKERS = ['.private.key', '.key'];

type ConfigFormat = 'yaml' | 'json';

interface ParsedConfig {
	format: ConfigFormat;
	thingName: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(section: unknown, key: string): string | undefined {
	if (!isRecord(section)) {
		return undefined;
	}
	const value = section[key];
	return typeof value === 'string' && value.length > 0 ? value : undefined;
}

async function statOrNull(target: string): Promise<Stats | null> {
	try {
		return await fs.stat(target);
	} catch {
		return null;
	}
}

export class ProvisioningStateDetector {
	private readonly logger: ComponentLogger;

	constructor(logger: ProvisioningLogger) {
		this.logger = new ComponentLogger(logger, 'ProvisioningStateDetector');
	}

	public async detect(installationRoot: string): Promise<ProvisioningState> {
		const root = path.resolve(installationRoot);
		this.logger.info(`Checking Greengrass provisioning status at: ${root}`);

		const rootStat = await statOrNull(root);
		if (!rootStat?.isDirectory()) {
			this.logger.info('Greengrass directory does not exist');
			return {
				isProvisioned: false,
				missingComponents: [],
				details: 'Greengrass directory does not exist',
			};
		}

		const configFile = await this.findConfigFile(root);
		const missingComponents: string[] = [];
		if (!configFile) {
			missingComponents.push('config');
		}
		if (!(await this.hasCertificates(root))) {
			missingComponents.push('certificates');
		}
		if (!(await statOrNull(path.join(root, 'ggc-root')))?.isDirectory()) {
			missingComponents.push('ggc-root');
		}

		if (!configFile || missingComponents.length > 0) {
			const details = `Missing components: ${missingComponents.join(', ')}`;
			this.logger.info(`Greengrass is not provisioned. ${details}`);
			return { isProvisioned: false, missingComponents, details };
		}

		const parsed = await this.parseConfig(configFile);
		if (!parsed) {
			this.logger.warn('Greengrass configuration file is invalid', { configFile });
			return {
				isProvisioned: false,
				missingComponents: [],
				details: 'Configuration file is invalid or corrupted',
			};
		}

		const agentVersion = await this.detectAgentVersion(root, parsed.format);
		this.logger.info(`Greengrass is already provisioned. Thing name: ${parsed.thingName}, Version: ${agentVersion}`);

		return {
			isProvisioned: true,
			thingName: parsed.thingName,
			agentVersion,
			configFilePath: configFile,
			missingComponents: [],
			details: 'Greengrass is fully provisioned',
		};
	}

	private async findConfigFile(root: string): Promise<string | null> {
		for (const variant of CONFIG_VARIANTS) {
			const candidate = path.join(root, 'config', variant);
			if ((await statOrNull(candidate))?.isFile()) {
				this.logger.debug(`Configuration file found: ${candidate}`);
				return candidate;
			}
		}
		this.logger.debug('No configuration file found');
		return null;
	}

	private async hasCertificates(root: string): Promise<boolean> {
		const certsDir = path.join(root, 'certs');
		let entries: string[];
		try {
			entries = await fs.readdir(certsDir);
		} catch {
			this.logger.debug('Certificates directory does not exist');
			return false;
		}

		let foundCert = false;
		let foundKey = false;
		for (const entry of entries) {
			if (!(await statOrNull(path.join(certsDir, entry)))?.isFile()) {
				continue;
			}
			if (CERTIFICATE_MARKERS.some((marker) => entry.includes(marker))) {
				foundCert = true;
			}
			if (PRIVATE_KEY_MARKERS.some((marker) => entry.includes(marker))) {
				foundKey = true;
			}
		}

		this.logger.debug(`Certificates check - cert: ${foundCert}, key: ${foundKey}`);
		return foundCert && foundKey;
	}

	private async parseConfig(configFile: string): Promise<ParsedConfig | null> {
		let content: string;
		try {
			content = await fs.readFile(configFile, 'utf-8');
		} catch (error) {
			this.logger.warn(`Cannot read configuration file: ${errorMessage(error)}`);
			return null;
		}

		if (content.trim().length === 0) {
			this.logger.warn(`Configuration file is empty: ${configFile}`);
			return null;
		}

		return configFile.endsWith('.json') ? this.parseJsonConfig(content) : this.parseYamlConfig(content);
	}

	private parseYamlConfig(content: string): ParsedConfig | null {
		let document: unknown;
		try {
			document = yaml.load(content);
		} catch (error) {
			this.logger.warn(`Failed to parse YAML configuration: ${errorMessage(error)}`);
			return null;
		}

		if (!isRecord(document) || !isRecord(document.system) || !isRecord(document.services)) {
			return null;
		}

		return {
			format: 'yaml',
			thingName: stringField(document.system, 'thingName') ?? 'unknown',
		};
	}

	/**
	 * v1 layout keeps the thing under coreThing; some files use system instead
	 */
	private parseJsonConfig(content: string): ParsedConfig | null {
		let document: unknown;
		try {
			document = JSON.parse(content);
		} catch (error) {
			this.logger.warn(`Failed to parse JSON configuration: ${errorMessage(error)}`);
			return null;
		}

		if (!isRecord(document) || !(isRecord(document.coreThing) || isRecord(document.system))) {
			return null;
		}

		return {
			format: 'json',
			thingName: stringField(document.coreThing, 'thingName')
				?? stringField(document.system, 'thingName')
				?? 'unknown',
		};
	}

	private async detectAgentVersion(root: string, format: ConfigFormat): Promise<string> {
		if ((await statOrNull(path.join(root, 'recipes')))?.isDirectory() || format === 'yaml') {
			return 'v2.x';
		}
		return format === 'json' ? 'v1.x' : 'unknown';
	}
}
