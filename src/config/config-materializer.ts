/**
 * CONFIG MATERIALIZER
 * ===================
 *
 * Turns a device identity record into the on-disk bundle the Greengrass
 * nucleus starts from:
 *
 *   <root>/
 *     config/config.yaml
 *     certs/<thing>.cert.pem
 *     certs/<thing>.private.key   (0600)
 *     certs/root.ca.pem
 *     logs/ work/ packages/ deployments/ ggc-root/
 *
 * Each call writes a fresh bundle over whatever is at the root. Failures are
 * returned as { success: false, error }, never thrown.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ComponentLogger } from '../logging/component-logger';
import type { ProvisioningLogger } from '../logging/provisioning-logger';
import { errorMessage } from '../errors';
import type { DeviceIdentityRecord } from '../identity/types';
import {
	ROOT_CA_FILENAME,
	bundlePaths,
	buildGreengrassConfig,
	renderGreengrassConfig,
} from './greengrass-config';
import type { BundlePaths, ConfigBundle } from './types';

export const GREENGRASS_DIRECTORIES = [
	'config',
	'certs',
	'logs',
	'work',
	'packages',
	'deployments',
	'ggc-root',
] as const;

const RESTRICTED_DIR_MODE = 0o750;
const PRIVATE_KEY_MODE = 0o600;
const FILE_MODE = 0o640;

export class ConfigMaterializer {
	private readonly logger: ComponentLogger;

	constructor(logger: ProvisioningLogger) {
		this.logger = new ComponentLogger(logger, 'ConfigMaterializer');
	}

	public async materialize(identity: DeviceIdentityRecord, targetRoot: string): Promise<ConfigBundle> {
		this.logger.info(`Generating Greengrass configuration for thing: ${identity.thingName}`);

		try {
			if (!identity.thingName || path.basename(identity.thingName) !== identity.thingName) {
				throw new Error(`Invalid thing name: "${identity.thingName}"`);
			}

			const root = path.resolve(targetRoot);
			const paths = bundlePaths(root, identity.thingName);

			await this.createDirectoryStructure(root);
			await this.writeCertificates(identity, paths);
			await this.writeConfigFile(identity, root, paths);
			await this.validate(paths);

			this.logger.info('Greengrass configuration generated successfully', { configFile: paths.configFilePath });
			return {
				success: true,
				configFilePath: paths.configFilePath,
				certificatePath: paths.certificatePath,
				privateKeyPath: paths.privateKeyPath,
				rootCaPath: paths.rootCaPath,
			};
		} catch (error) {
			const message = errorMessage(error);
			this.logger.error('Failed to generate configuration', error);
			return { success: false, error: message };
		}
	}

	private async createDirectoryStructure(root: string): Promise<void> {
		await fs.mkdir(root, { recursive: true });
		await fs.chmod(root, RESTRICTED_DIR_MODE);

		for (const dir of GREENGRASS_DIRECTORIES) {
			await fs.mkdir(path.join(root, dir), { recursive: true });
		}
		await fs.chmod(path.join(root, 'certs'), RESTRICTED_DIR_MODE);

		this.logger.debug(`Created directory structure at ${root}`);
	}

	private async writeCertificates(identity: DeviceIdentityRecord, paths: BundlePaths): Promise<void> {
		await this.removeStaleCredentials(paths);

		await this.writeFile(paths.certificatePath, identity.certificatePem, FILE_MODE);
		await this.writeFile(paths.privateKeyPath, identity.privateKeyPem, PRIVATE_KEY_MODE);
		await this.writeFile(paths.rootCaPath, await this.resolveRootCa(identity.rootCaMaterial), FILE_MODE);

		this.logger.debug('Certificates written', { certsDir: paths.certsDir });
	}

	/**
	 * Credentials left by a previous bundle for another thing
	 */
	private async removeStaleCredentials(paths: BundlePaths): Promise<void> {
		const keep = new Set([path.basename(paths.certificatePath), path.basename(paths.privateKeyPath), ROOT_CA_FILENAME]);
		const entries = await fs.readdir(paths.certsDir);

		for (const entry of entries) {
			if (keep.has(entry)) {
				continue;
			}
			if (entry.endsWith('.cert.pem') || entry.endsWith('.private.key')) {
				await fs.rm(path.join(paths.certsDir, entry), { force: true });
				this.logger.debug(`Removed stale credential file: ${entry}`);
			}
		}
	}

	/**
	 * rootCaMaterial naming an existing file is read from it; anything else is
	 * inline PEM
	 */
	private async resolveRootCa(material: string): Promise<string> {
		if (material.includes('-----BEGIN')) {
			return material;
		}
		try {
			const stat = await fs.stat(material);
			if (stat.isFile()) {
				this.logger.debug(`Reading root CA from ${material}`);
				return await fs.readFile(material, 'utf-8');
			}
		} catch {
			// not a path
		}
		return material;
	}

	private async writeConfigFile(identity: DeviceIdentityRecord, root: string, paths: BundlePaths): Promise<void> {
		const content = renderGreengrassConfig(buildGreengrassConfig(identity, root));
		await this.writeFile(paths.configFilePath, content, FILE_MODE);
		this.logger.debug(`Configuration written to ${paths.configFilePath}`);
	}

	private async validate(paths: BundlePaths): Promise<void> {
		try {
			await fs.access(paths.configFilePath);
		} catch {
			throw new Error(`Configuration file not found: ${paths.configFilePath}`);
		}

		const entries = await fs.readdir(paths.certsDir);
		if (!entries.some((entry) => entry.endsWith('.pem') || entry.endsWith('.key'))) {
			throw new Error(`No certificate files found in ${paths.certsDir}`);
		}
	}

	private async writeFile(filePath: string, content: string, mode: number): Promise<void> {
		await fs.writeFile(filePath, content, { encoding: 'utf-8', mode });
		// writeFile only applies mode to new files
		await fs.chmod(filePath, mode);
	}
}
