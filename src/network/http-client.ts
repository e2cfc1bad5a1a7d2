/**
 * Network Client
 * ==============
 *
 * Process-scoped HTTP state shared by the connectivity probe and the agent
 * download. Created explicitly, released with close() (see withNetworkClient).
 *
 * Two bounds apply to every request:
 * - connectTimeoutMs: no socket activity for this long aborts the request
 * - timeoutMs: hard limit on the whole request, response body included
 */

import * as fs from 'fs';
import * as http from 'http';
import * as https from 'https';
import { pipeline } from 'stream/promises';
import type { Readable } from 'stream';
import axios from 'axios';
import type { AxiosInstance } from 'axios';

export const DEFAULT_TIMEOUT_MS = 10000;

export interface NetworkClientOptions {
	/** Hard limit for a request (default 10s) */
	timeoutMs?: number;
	/** Idle/connect limit (default: half of timeoutMs) */
	connectTimeoutMs?: number;
	userAgent?: string;
}

export interface HttpClient {
	/** HEAD request; resolves with the final status code after redirects */
	head(url: string): Promise<number>;
	/** Stream a GET response body into destination */
	download(url: string, destination: string, timeoutMs?: number): Promise<void>;
	close(): void;
}

export class NetworkClient implements HttpClient {
	private readonly httpAgent: http.Agent;
	private readonly httpsAgent: https.Agent;
	private readonly client: AxiosInstance;
	private readonly timeoutMs: number;
	private readonly connectTimeoutMs: number;
	private closed = false;

	constructor(options: NetworkClientOptions = {}) {
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.connectTimeoutMs = options.connectTimeoutMs ?? Math.max(1, Math.floor(this.timeoutMs / 2));

		this.httpAgent = new http.Agent({ keepAlive: false });
		this.httpsAgent = new https.Agent({ keepAlive: false, rejectUnauthorized: true });

		this.client = axios.create({
			httpAgent: this.httpAgent,
			httpsAgent: this.httpsAgent,
			maxRedirects: 5,
			timeout: this.connectTimeoutMs,
			headers: {
				'User-Agent': options.userAgent ?? 'greengrass-provisioner',
			},
		});
	}

	public async head(url: string): Promise<number> {
		this.assertOpen();
		const response = await this.client.head(url, {
			signal: AbortSignal.timeout(this.timeoutMs),
			validateStatus: () => true,
		});
		return response.status;
	}

	public async download(url: string, destination: string, timeoutMs: number = this.timeoutMs): Promise<void> {
		this.assertOpen();
		const response = await this.client.get<Readable>(url, {
			responseType: 'stream',
			signal: AbortSignal.timeout(timeoutMs),
		});
		await pipeline(response.data, fs.createWriteStream(destination));
	}

	public close(): void {
		if (this.closed) {
			return;
		}
		this.closed = true;
		this.httpAgent.destroy();
		this.httpsAgent.destroy();
	}

	private assertOpen(): void {
		if (this.closed) {
			throw new Error('Network client has been closed');
		}
	}
}

export type HttpClientFactory = (options: NetworkClientOptions) => HttpClient;

export const createNetworkClient: HttpClientFactory = (options) => new NetworkClient(options);

/**
 * Run fn with a fresh client, releasing it however fn ends
 */
export async function withNetworkClient<T>(
	factory: HttpClientFactory,
	options: NetworkClientOptions,
	fn: (client: HttpClient) => Promise<T>,
): Promise<T> {
	const client = factory(options);
	try {
		return await fn(client);
	} finally {
		client.close();
	}
}
