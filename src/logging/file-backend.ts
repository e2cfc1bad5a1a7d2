/**
 * File Log Backend
 *
 * Persists every entry as a JSON line through winston, rotating the file when it
 * reaches maxSize bytes and keeping maxFiles generations.
 */

import * as fs from 'fs';
import * as path from 'path';
import winston from 'winston';
import type { LogBackend, LogEntry } from './types';

export interface FileLogBackendOptions {
	filename: string;
	/** Rotate when the file reaches this size (bytes) */
	maxSize?: number;
	/** Number of rotated files to keep */
	maxFiles?: number;
}

export class FileLogBackend implements LogBackend {
	private readonly logger: winston.Logger;

	constructor(options: FileLogBackendOptions) {
		// Throws when the directory cannot be created
		fs.mkdirSync(path.dirname(options.filename), { recursive: true });

		this.logger = winston.createLogger({
			level: 'debug',
			format: winston.format.json(),
			defaultMeta: { service: 'greengrass-provisioner' },
			transports: [
				new winston.transports.File({
					filename: options.filename,
					maxsize: options.maxSize ?? 10 * 1024 * 1024, // 10MB
					maxFiles: options.maxFiles ?? 3,
					tailable: true,
				}),
			],
			exitOnError: false,
		});

		this.logger.on('error', (err) => {
			console.error(`[FileLogBackend] Failed to write ${options.filename}:`, err);
		});
	}

	public log(entry: LogEntry): void {
		this.logger.log({
			...entry.context,
			level: entry.level,
			message: entry.message,
			component: entry.component,
			timestamp: new Date(entry.timestamp).toISOString(),
		});
	}

	public close(): Promise<void> {
		return new Promise((resolve) => {
			this.logger.on('finish', () => resolve());
			this.logger.end();
		});
	}
}
