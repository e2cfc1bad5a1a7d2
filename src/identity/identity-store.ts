/**
 * Device Identity Store
 *
 * Read-only access to the device database (SQLite):
 * - device_config: one identity record per device_id
 * - device_identifiers: mac_address / serial_number aliases for a device_id
 *
 * Not-found resolves to null. Connection and query failures reject with
 * IdentityStoreError.
 */

import * as fs from 'fs';
import { knex } from 'knex';
import type { Knex } from 'knex';
import type { Database } from 'sqlite3';
import { ComponentLogger } from '../logging/component-logger';
import type { ProvisioningLogger } from '../logging/provisioning-logger';
import { IdentityStoreError, errorMessage } from '../errors';
import { rowToIdentityRecord } from './types';
import type { DeviceConfigRow, DeviceIdentifierRow, DeviceIdentityRecord } from './types';

export const DEVICE_CONFIG_TABLE = 'device_config';
export const DEVICE_IDENTIFIERS_TABLE = 'device_identifiers';

export class DeviceIdentityStore {
	private db: Knex | null = null;
	private readonly logger: ComponentLogger;

	constructor(
		private readonly databasePath: string,
		logger: ProvisioningLogger,
	) {
		this.logger = new ComponentLogger(logger, 'DeviceIdentityStore');
	}

	public async connect(): Promise<void> {
		if (this.db) {
			this.logger.warn('Database already connected');
			return;
		}

		if (!fs.existsSync(this.databasePath)) {
			throw new IdentityStoreError(`Cannot open database: ${this.databasePath} does not exist`);
		}

		const db = knex({
			client: 'sqlite3',
			connection: {
				filename: this.databasePath,
			},
			pool: {
				min: 1,
				max: 1,
				// Read-only session: the store never writes to the device database
				afterCreate: (conn: Database, done: (error: Error | null, conn: Database) => void) => {
					conn.run('PRAGMA query_only = ON', (error: Error | null) => done(error, conn));
				},
			},
			useNullAsDefault: true,
		});

		try {
			await db.raw('SELECT count(*) AS tables FROM sqlite_master');
		} catch (error) {
			await db.destroy();
			throw new IdentityStoreError(`Cannot open database: ${errorMessage(error)}`);
		}

		this.db = db;
		this.logger.info(`Successfully connected to database: ${this.databasePath}`);
	}

	public async disconnect(): Promise<void> {
		if (!this.db) {
			return;
		}
		const db = this.db;
		this.db = null;
		await db.destroy();
		this.logger.debug('Disconnected from database');
	}

	public isConnected(): boolean {
		return this.db !== null;
	}

	public async lookupById(deviceId: string): Promise<DeviceIdentityRecord | null> {
		const db = this.requireConnection();

		const row = await this.query('reading device configuration', () =>
			db<DeviceConfigRow>(DEVICE_CONFIG_TABLE).where('device_id', deviceId).first(),
		);

		if (!row) {
			this.logger.warn(`No device configuration found for device_id: ${deviceId}`);
			return null;
		}

		this.logger.info(`Found device configuration for device_id: ${deviceId}`);
		return rowToIdentityRecord(row);
	}

	/**
	 * Resolve a hardware address or serial number (tried in that order) to a
	 * device_id, then read that device's record
	 */
	public async lookupByIdentifier(identifier: string): Promise<DeviceIdentityRecord | null> {
		const db = this.requireConnection();

		const byMac = await this.query('looking up identifier', () =>
			db<DeviceIdentifierRow>(DEVICE_IDENTIFIERS_TABLE)
				.whereRaw('lower(mac_address) = ?', [identifier.toLowerCase()])
				.first(),
		);
		const alias = byMac ?? await this.query('looking up identifier', () =>
			db<DeviceIdentifierRow>(DEVICE_IDENTIFIERS_TABLE).where('serial_number', identifier).first(),
		);

		if (!alias) {
			this.logger.warn(`No device found for identifier: ${identifier}`);
			return null;
		}

		this.logger.debug(`Found device_id ${alias.device_id} for identifier ${identifier}`);
		return this.lookupById(alias.device_id);
	}

	public async listIds(): Promise<string[]> {
		const db = this.requireConnection();

		const rows = await this.query('listing devices', () =>
			db<DeviceConfigRow>(DEVICE_CONFIG_TABLE).select('device_id').orderBy('device_id'),
		);

		this.logger.debug(`Found ${rows.length} devices in database`);
		return rows.map((row) => row.device_id);
	}

	private requireConnection(): Knex {
		if (!this.db) {
			throw new IdentityStoreError('Database not connected');
		}
		return this.db;
	}

	private async query<T>(operation: string, run: () => Promise<T>): Promise<T> {
		try {
			return await run();
		} catch (error) {
			throw new IdentityStoreError(`Error ${operation}: ${errorMessage(error)}`);
		}
	}
}
