/**
 * Logging types and interfaces
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
	component?: string;
	operation?: string;
	[key: string]: unknown;
}

export interface LogEntry {
	/** Timestamp in milliseconds since epoch */
	timestamp: number;
	level: LogLevel;
	message: string;
	/** Component that produced the entry (defaults to 'provisioner') */
	component: string;
	context?: Record<string, unknown>;
}

export interface LogBackend {
	/** Store or print a log entry */
	log(entry: LogEntry): void;
	/** Flush and release resources */
	close(): Promise<void>;
}
