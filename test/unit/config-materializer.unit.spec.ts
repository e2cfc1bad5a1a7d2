/**
 * Unit tests for ConfigMaterializer and the config.yaml renderer
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ConfigMaterializer, GREENGRASS_DIRECTORIES } from '../../src/config/config-materializer';
import { buildGreengrassConfig, renderGreengrassConfig } from '../../src/config/greengrass-config';
import {
	TEST_CERTIFICATE,
	TEST_PRIVATE_KEY,
	TEST_ROOT_CA,
	makeTempDir,
	removeDir,
	sampleIdentity,
	silentLogger,
} from '../helpers/fixtures';

function modeOf(file: string): number {
	return fs.statSync(file).mode & 0o777;
}

describe('ConfigMaterializer', () => {
	let dir: string;
	let root: string;
	let materializer: ConfigMaterializer;

	beforeEach(() => {
		dir = makeTempDir('materializer-');
		root = path.join(dir, 'greengrass', 'v2');
		materializer = new ConfigMaterializer(silentLogger());
	});

	afterEach(() => {
		removeDir(dir);
	});

	it('should return the paths of the written bundle', async () => {
		const bundle = await materializer.materialize(sampleIdentity(), root);

		expect(bundle).toEqual({
			success: true,
			configFilePath: path.join(root, 'config', 'config.yaml'),
			certificatePath: path.join(root, 'certs', 'TestThing.cert.pem'),
			privateKeyPath: path.join(root, 'certs', 'TestThing.private.key'),
			rootCaPath: path.join(root, 'certs', 'root.ca.pem'),
		});
	});

	it('should create the full directory tree', async () => {
		await materializer.materialize(sampleIdentity(), root);

		for (const sub of GREENGRASS_DIRECTORIES) {
			expect(fs.statSync(path.join(root, sub)).isDirectory()).toBe(true);
		}
		expect(modeOf(root)).toBe(0o750);
		expect(modeOf(path.join(root, 'certs'))).toBe(0o750);
	});

	it('should write the credentials verbatim', async () => {
		await materializer.materialize(sampleIdentity(), root);

		expect(fs.readFileSync(path.join(root, 'certs', 'TestThing.cert.pem'), 'utf-8')).toBe(TEST_CERTIFICATE);
		expect(fs.readFileSync(path.join(root, 'certs', 'TestThing.private.key'), 'utf-8')).toBe(TEST_PRIVATE_KEY);
		expect(fs.readFileSync(path.join(root, 'certs', 'root.ca.pem'), 'utf-8')).toBe(TEST_ROOT_CA);
	});

	it('should restrict the private key to its owner', async () => {
		const bundle = await materializer.materialize(sampleIdentity(), root);
		if (!bundle.success) throw new Error(bundle.error);

		expect(modeOf(bundle.privateKeyPath) & 0o077).toBe(0);
		expect(modeOf(bundle.privateKeyPath)).toBe(0o600);
	});

	it('should make other files owner read/write and group readable', async () => {
		const bundle = await materializer.materialize(sampleIdentity(), root);
		if (!bundle.success) throw new Error(bundle.error);

		expect(modeOf(bundle.certificatePath)).toBe(0o640);
		expect(modeOf(bundle.rootCaPath)).toBe(0o640);
		expect(modeOf(bundle.configFilePath)).toBe(0o640);
	});

	it('should read the root CA from a file when the material is a path', async () => {
		const caFile = path.join(dir, 'AmazonRootCA1.pem');
		fs.writeFileSync(caFile, TEST_ROOT_CA);

		await materializer.materialize(sampleIdentity({ rootCaMaterial: caFile }), root);

		expect(fs.readFileSync(path.join(root, 'certs', 'root.ca.pem'), 'utf-8')).toBe(TEST_ROOT_CA);
	});

	it('should treat material naming no existing file as inline content', async () => {
		const material = path.join(dir, 'missing-ca.pem');

		await materializer.materialize(sampleIdentity({ rootCaMaterial: material }), root);

		expect(fs.readFileSync(path.join(root, 'certs', 'root.ca.pem'), 'utf-8')).toBe(material);
	});

	it('should leave only the second thing after materializing twice', async () => {
		await materializer.materialize(sampleIdentity({ thingName: 'FirstThing' }), root);
		await materializer.materialize(sampleIdentity({ thingName: 'SecondThing' }), root);

		const config = fs.readFileSync(path.join(root, 'config', 'config.yaml'), 'utf-8');
		expect(config).toContain('SecondThing');
		expect(config).not.toContain('FirstThing');
		expect(fs.readdirSync(path.join(root, 'certs')).sort()).toEqual([
			'SecondThing.cert.pem',
			'SecondThing.private.key',
			'root.ca.pem',
		]);
	});

	it('should report a thing name that is not a plain file name', async () => {
		const bundle = await materializer.materialize(sampleIdentity({ thingName: '../escape' }), root);

		expect(bundle).toEqual({ success: false, error: 'Invalid thing name: "../escape"' });
	});

	it('should report filesystem failures instead of throwing', async () => {
		const blocker = path.join(dir, 'file-not-dir');
		fs.writeFileSync(blocker, '');

		const bundle = await materializer.materialize(sampleIdentity(), path.join(blocker, 'v2'));

		expect(bundle.success).toBe(false);
		if (!bundle.success) {
			expect(bundle.error).toContain('ENOTDIR');
		}
	});
});

describe('buildGreengrassConfig', () => {
	const root = '/greengrass/v2';

	it('should render the system section and nucleus configuration', () => {
		const document = buildGreengrassConfig(sampleIdentity(), root);

		expect(document).toEqual({
			system: {
				certificateFilePath: '/greengrass/v2/certs/TestThing.cert.pem',
				privateKeyPath: '/greengrass/v2/certs/TestThing.private.key',
				rootCaPath: '/greengrass/v2/certs/root.ca.pem',
				rootpath: '/greengrass/v2',
				thingName: 'TestThing',
			},
			services: {
				'aws.greengrass.Nucleus': {
					version: '2.9.0',
					configuration: {
						awsRegion: 'us-east-1',
						iotRoleAlias: 'TestRoleAlias',
						iotDataEndpoint: 'test-ats.iot.us-east-1.amazonaws.com',
						iotCredEndpoint: 'test.credentials.iot.us-east-1.amazonaws.com',
						logging: {
							level: 'INFO',
							fileSizeKB: 1024,
							totalLogsSizeKB: 25600,
							format: 'JSON',
						},
					},
				},
			},
		});
	});

	it('should include optional sections only when their fields are present', () => {
		const document = buildGreengrassConfig(
			sampleIdentity({
				agentVersion: '2.12.1',
				mqttPort: 443,
				proxyUrl: 'http://proxy.local:3128',
				deploymentGroup: 'factory-a',
			}),
			root,
		);
		const nucleus = document.services['aws.greengrass.Nucleus'];

		expect(nucleus.version).toBe('2.12.1');
		expect(nucleus.configuration.mqtt).toEqual({ port: 443 });
		expect(nucleus.configuration.networkProxy).toEqual({ proxy: { url: 'http://proxy.local:3128' } });
		expect(nucleus.configuration.deploymentPollingFrequency).toBe(15);
		expect(nucleus.configuration.componentStoreMaxSizeBytes).toBe(10737418240);
		expect(nucleus.configuration.deploymentStatusKeepAliveFrequency).toBe(60);
	});

	it('should round-trip through YAML', () => {
		const document = buildGreengrassConfig(sampleIdentity({ mqttPort: 8883 }), root);
		const rendered = renderGreengrassConfig(document);

		expect(rendered.startsWith('---\n')).toBe(true);
		expect(yaml.load(rendered)).toEqual(document);
	});
});
