/**
 * Console Log Backend
 *
 * Human-readable lines for the terminal and the journal:
 *   2024-01-15T12:00:00.000Z [INFO] [ConnectivityProbe] Connectivity check passed {"latencyMs":42}
 */

import type { LogBackend, LogEntry } from './types';

export class ConsoleLogBackend implements LogBackend {
	public log(entry: LogEntry): void {
		const prefix = `${new Date(entry.timestamp).toISOString()} [${entry.level.toUpperCase()}] [${entry.component}]`;

		let output = `${prefix} ${entry.message}`;
		if (entry.context && Object.keys(entry.context).length > 0) {
			output += ` ${JSON.stringify(entry.context)}`;
		}

		switch (entry.level) {
			case 'debug':
			case 'info':
				console.log(output);
				break;
			case 'warn':
				console.warn(output);
				break;
			case 'error':
				console.error(output);
				break;
		}
	}

	public async close(): Promise<void> {}
}
