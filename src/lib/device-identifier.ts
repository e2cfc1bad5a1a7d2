/**
 * Device identifiers
 *
 * Physical identifiers used to find this device's record when no device id
 * is configured, most specific first: network hardware address, board/DMI
 * serial number, hostname.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

export interface DeviceIdentifierOptions {
	/** Interface whose hardware address is used (default eth0) */
	netInterface?: string;
	/** Filesystem root holding /sys and /proc (tests point this elsewhere) */
	sysRoot?: string;
	hostname?: () => string;
}

const SERIAL_SOURCES = [
	'proc/device-tree/serial-number',
	'sys/class/dmi/id/product_serial',
];

const NULL_MAC = '00:00:00:00:00:00';

async function readTrimmed(file: string): Promise<string | null> {
	try {
		// device-tree strings are NUL terminated
		const value = (await fs.readFile(file, 'utf-8')).replace(/\0/g, '').trim();
		return value.length > 0 ? value : null;
	} catch {
		return null;
	}
}

export async function collectDeviceIdentifiers(options: DeviceIdentifierOptions = {}): Promise<string[]> {
	const sysRoot = options.sysRoot ?? '/';
	const netInterface = options.netInterface ?? 'eth0';
	const identifiers: string[] = [];

	const mac = await readTrimmed(path.join(sysRoot, 'sys/class/net', netInterface, 'address'));
	if (mac && mac !== NULL_MAC) {
		identifiers.push(mac.toLowerCase());
	}

	for (const source of SERIAL_SOURCES) {
		const serial = await readTrimmed(path.join(sysRoot, source));
		if (serial) {
			identifiers.push(serial);
			break;
		}
	}

	const hostname = (options.hostname ?? os.hostname)().trim();
	if (hostname) {
		identifiers.push(hostname);
	}

	return [...new Set(identifiers)];
}
