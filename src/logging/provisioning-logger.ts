/**
 * Provisioning Logger
 * ===================
 *
 * Leveled, structured logging for the provisioning workflow. Entries below the
 * minimum level are dropped; the rest are handed to every backend
 * (ConsoleLogBackend, FileLogBackend, ...).
 *
 * Usage:
 *   const logger = new ProvisioningLogger([new ConsoleLogBackend()], 'debug');
 *   logger.info('Connectivity check passed', { component: 'ConnectivityProbe', latencyMs: 42 });
 *   logger.error('Failed to start service', error, { component: 'InstallationDriver' });
 */

import type { LogBackend, LogContext, LogEntry, LogLevel } from './types';

// Log level hierarchy for filtering
const LOG_LEVELS: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
	return value in LOG_LEVELS;
}

export class ProvisioningLogger {
	private backends: LogBackend[];
	private minLogLevel: LogLevel;

	constructor(backends: LogBackend | LogBackend[] = [], initialLogLevel: LogLevel = 'info') {
		this.backends = Array.isArray(backends) ? backends : [backends];
		this.minLogLevel = initialLogLevel;
	}

	public addBackend(backend: LogBackend): void {
		this.backends.push(backend);
	}

	public setLogLevel(level: LogLevel): void {
		this.minLogLevel = level;
	}

	public getLogLevel(): LogLevel {
		return this.minLogLevel;
	}

	public isLevelEnabled(level: LogLevel): boolean {
		return LOG_LEVELS[level] >= LOG_LEVELS[this.minLogLevel];
	}

	public debug(message: string, context?: LogContext): void {
		this.log('debug', message, context);
	}

	public info(message: string, context?: LogContext): void {
		this.log('info', message, context);
	}

	public warn(message: string, context?: LogContext): void {
		this.log('warn', message, context);
	}

	public error(message: string, error?: unknown, context?: LogContext): void {
		const errorContext = error instanceof Error
			? { error: { name: error.name, message: error.message, stack: error.stack } }
			: error !== undefined ? { error: String(error) } : {};

		this.log('error', message, {
			...context,
			...errorContext,
		});
	}

	/**
	 * Close every backend (flushes the log file)
	 */
	public async close(): Promise<void> {
		await Promise.all(this.backends.map((backend) => backend.close()));
	}

	private log(level: LogLevel, message: string, context?: LogContext): void {
		if (!this.isLevelEnabled(level)) {
			return;
		}

		const { component, ...rest } = context ?? {};
		const entry: LogEntry = {
			timestamp: Date.now(),
			level,
			message,
			component: component || 'provisioner',
			...(Object.keys(rest).length > 0 ? { context: rest } : {}),
		};

		for (const backend of this.backends) {
			try {
				backend.log(entry);
			} catch (err) {
				console.error('[ProvisioningLogger] Failed to log to backend:', err);
			}
		}
	}
}
