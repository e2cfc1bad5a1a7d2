/**
 * Unit tests for DeviceIdentityStore
 *
 * Runs against real SQLite files created in a temp directory.
 */

import * as fs from 'fs';
import * as path from 'path';
import { DeviceIdentityStore } from '../../src/identity/identity-store';
import { parseComponentList, validateIdentityRecord } from '../../src/identity/types';
import { IdentityStoreError } from '../../src/errors';
import {
	TEST_CERTIFICATE,
	createIdentityDatabase,
	makeTempDir,
	removeDir,
	sampleIdentity,
	sampleRow,
	silentLogger,
} from '../helpers/fixtures';

describe('DeviceIdentityStore', () => {
	let dir: string;
	let store: DeviceIdentityStore;

	beforeEach(async () => {
		dir = makeTempDir('identity-');
		const databasePath = await createIdentityDatabase(
			dir,
			[
				sampleRow({
					device_id: 'device-001',
					nucleus_version: '2.12.1',
					deployment_group: 'factory-a',
					initial_components: 'aws.greengrass.Cli, ,aws.greengrass.LogManager,',
					proxy_url: '',
					mqtt_port: 8883,
				}),
				sampleRow({ device_id: 'default', thing_name: 'DefaultThing' }),
				sampleRow({ device_id: 'device-000', thing_name: 'FirstThing' }),
			],
			[
				{ device_id: 'device-001', mac_address: 'aa:bb:cc:dd:ee:01', serial_number: 'SN-0001' },
				{ device_id: 'device-000', mac_address: null, serial_number: 'SN-0000' },
				{ device_id: 'ghost', mac_address: 'aa:bb:cc:dd:ee:99', serial_number: null },
			],
		);
		store = new DeviceIdentityStore(databasePath, silentLogger());
	});

	afterEach(async () => {
		await store.disconnect();
		removeDir(dir);
	});

	describe('connection', () => {
		it('should connect and disconnect', async () => {
			expect(store.isConnected()).toBe(false);
			await store.connect();
			expect(store.isConnected()).toBe(true);
			await store.disconnect();
			expect(store.isConnected()).toBe(false);
		});

		it('should reject operations before connect', async () => {
			await expect(store.lookupById('device-001')).rejects.toThrow(new IdentityStoreError('Database not connected'));
			await expect(store.listIds()).rejects.toBeInstanceOf(IdentityStoreError);
		});

		it('should fail to connect to a missing database', async () => {
			const missing = new DeviceIdentityStore(path.join(dir, 'missing.db'), silentLogger());

			await expect(missing.connect()).rejects.toThrow(`Cannot open database: ${path.join(dir, 'missing.db')} does not exist`);
			expect(missing.isConnected()).toBe(false);
		});

		it('should fail to connect to a file that is not a database', async () => {
			const bogus = path.join(dir, 'bogus.db');
			fs.writeFileSync(bogus, 'not a database\n'.repeat(64));
			const broken = new DeviceIdentityStore(bogus, silentLogger());

			await expect(broken.connect()).rejects.toBeInstanceOf(IdentityStoreError);
			expect(broken.isConnected()).toBe(false);
		});
	});

	describe('lookupById', () => {
		it('should map a row to an identity record', async () => {
			await store.connect();

			const record = await store.lookupById('device-001');

			expect(record).toEqual({
				deviceId: 'device-001',
				thingName: 'TestThing',
				iotDataEndpoint: 'test-ats.iot.us-east-1.amazonaws.com',
				awsRegion: 'us-east-1',
				rootCaMaterial: expect.stringContaining('test-root-ca'),
				certificatePem: TEST_CERTIFICATE,
				privateKeyPem: expect.stringContaining('test-key'),
				roleAlias: 'TestRoleAlias',
				roleAliasEndpoint: 'test.credentials.iot.us-east-1.amazonaws.com',
				agentVersion: '2.12.1',
				deploymentGroup: 'factory-a',
				initialComponents: ['aws.greengrass.Cli', 'aws.greengrass.LogManager'],
				proxyUrl: undefined,
				mqttPort: 8883,
				customDomain: undefined,
			});
		});

		it('should map NULL optional columns to absent values', async () => {
			await store.connect();

			const record = await store.lookupById('default');

			expect(record?.agentVersion).toBeUndefined();
			expect(record?.deploymentGroup).toBeUndefined();
			expect(record?.mqttPort).toBeUndefined();
			expect(record?.initialComponents).toEqual([]);
		});

		it('should resolve null for an unknown id', async () => {
			await store.connect();
			expect(await store.lookupById('nope')).toBeNull();
		});

		it('should treat ids as data, not SQL', async () => {
			await store.connect();
			expect(await store.lookupById("' OR '1'='1")).toBeNull();
		});
	});

	describe('lookupByIdentifier', () => {
		it('should resolve a hardware address', async () => {
			await store.connect();
			const record = await store.lookupByIdentifier('aa:bb:cc:dd:ee:01');
			expect(record?.deviceId).toBe('device-001');
		});

		it('should match hardware addresses case-insensitively', async () => {
			await store.connect();
			const record = await store.lookupByIdentifier('AA:BB:CC:DD:EE:01');
			expect(record?.deviceId).toBe('device-001');
		});

		it('should fall back to the serial number', async () => {
			await store.connect();
			const record = await store.lookupByIdentifier('SN-0000');
			expect(record?.thingName).toBe('FirstThing');
		});

		it('should resolve null when no alias matches', async () => {
			await store.connect();
			expect(await store.lookupByIdentifier('ff:ff:ff:ff:ff:ff')).toBeNull();
		});

		it('should resolve null when the alias points at a missing record', async () => {
			await store.connect();
			expect(await store.lookupByIdentifier('aa:bb:cc:dd:ee:99')).toBeNull();
		});
	});

	describe('listIds', () => {
		it('should list every device id in order', async () => {
			await store.connect();
			expect(await store.listIds()).toEqual(['default', 'device-000', 'device-001']);
		});
	});

	describe('read-only access', () => {
		it('should leave the database file unchanged', async () => {
			await store.connect();
			const before = fs.statSync(path.join(dir, 'devices.db')).size;
			await store.listIds();
			await store.lookupByIdentifier('SN-0001');
			expect(fs.statSync(path.join(dir, 'devices.db')).size).toBe(before);
		});

		it('should open an existing database and serve queries without changing its bytes', async () => {
			const databasePath = path.join(dir, 'devices.db');
			const before = fs.readFileSync(databasePath);

			await expect(store.connect()).resolves.toBeUndefined();
			expect(await store.lookupById('device-001')).toMatchObject({ thingName: 'TestThing' });
			await store.disconnect();

			expect(fs.readFileSync(databasePath).equals(before)).toBe(true);
		});
	});
});

describe('parseComponentList', () => {
	it('should split, trim and drop empty segments', () => {
		expect(parseComponentList('a,,b, c ,')).toEqual(['a', 'b', 'c']);
	});

	it('should return an empty list for null or empty input', () => {
		expect(parseComponentList(null)).toEqual([]);
		expect(parseComponentList('')).toEqual([]);
	});
});

describe('validateIdentityRecord', () => {
	it('should accept a complete record', () => {
		expect(validateIdentityRecord(sampleIdentity())).toEqual({ valid: true });
	});

	it('should name every empty required field', () => {
		const result = validateIdentityRecord(sampleIdentity({ thingName: '', roleAlias: '  ' }));
		expect(result).toEqual({ valid: false, fields: ['thingName', 'roleAlias'] });
	});

	it('should reject an out-of-range MQTT port', () => {
		const result = validateIdentityRecord(sampleIdentity({ mqttPort: 70000 }));
		expect(result).toEqual({ valid: false, fields: ['mqttPort'] });
	});
});
