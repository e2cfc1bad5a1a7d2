/**
 * CONNECTIVITY PROBE
 * ==================
 *
 * Decides whether the device can reach the AWS endpoints provisioning needs:
 *
 * 1. DNS: resolve a well-known public name
 * 2. HTTPS: HEAD a fixed reference endpoint (TLS verified)
 * 3. Latency: duration of that same request
 * 4. Endpoints: the override endpoint alone, or the candidate list in order
 *    until one answers
 *
 * Any failure short-circuits; later checks are not attempted.
 */

import { lookup } from 'dns/promises';
import { ComponentLogger } from '../logging/component-logger';
import type { ProvisioningLogger } from '../logging/provisioning-logger';
import { errorMessage } from '../errors';
import { DEFAULT_TIMEOUT_MS, createNetworkClient, withNetworkClient } from './http-client';
import type { HttpClient, HttpClientFactory } from './http-client';
import type { ConnectivityResult, HostResolver } from './types';

export const DEFAULT_DNS_HOSTNAME = 'amazonaws.com';
export const DEFAULT_REFERENCE_URL = 'https://www.amazontrust.com';
export const DEFAULT_CANDIDATE_ENDPOINTS: readonly string[] = [
	'https://iot.us-east-1.amazonaws.com',
	'https://iot.us-west-2.amazonaws.com',
	'https://greengrass.us-east-1.amazonaws.com',
	'https://www.amazontrust.com',
];

export interface ConnectivityProbeOptions {
	/** Single endpoint that replaces the candidate list */
	endpointOverride?: string;
	timeoutMs?: number;
	dnsHostname?: string;
	referenceUrl?: string;
	candidateEndpoints?: readonly string[];
	resolver?: HostResolver;
	clientFactory?: HttpClientFactory;
}

const defaultResolver: HostResolver = async (hostname) => {
	const { address } = await lookup(hostname);
	return address;
};

/**
 * Give a bare `host[:port]` override a scheme: plain http in test mode (mock
 * endpoints), https otherwise.
 */
export function normalizeEndpoint(endpoint: string, testMode: boolean): string {
	const trimmed = endpoint.trim();
	if (/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)) {
		return trimmed;
	}
	return `${testMode ? 'http' : 'https'}://${trimmed}`;
}

export class ConnectivityProbe {
	private readonly logger: ComponentLogger;
	private readonly timeoutMs: number;
	private readonly dnsHostname: string;
	private readonly referenceUrl: string;
	private readonly candidateEndpoints: readonly string[];
	private readonly resolver: HostResolver;
	private readonly clientFactory: HttpClientFactory;
	private endpointOverride?: string;

	constructor(options: ConnectivityProbeOptions, logger: ProvisioningLogger) {
		this.logger = new ComponentLogger(logger, 'ConnectivityProbe');
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.dnsHostname = options.dnsHostname ?? DEFAULT_DNS_HOSTNAME;
		this.referenceUrl = options.referenceUrl ?? DEFAULT_REFERENCE_URL;
		this.candidateEndpoints = options.candidateEndpoints ?? DEFAULT_CANDIDATE_ENDPOINTS;
		this.resolver = options.resolver ?? defaultResolver;
		this.clientFactory = options.clientFactory ?? createNetworkClient;
		this.endpointOverride = options.endpointOverride;

		if (this.endpointOverride) {
			this.logger.info(`Using override endpoint: ${this.endpointOverride}`);
		}
	}

	public setEndpointOverride(endpoint: string | undefined): void {
		this.endpointOverride = endpoint;
	}

	/**
	 * Endpoints the probe will try, in order
	 */
	public getEndpoints(): string[] {
		return this.endpointOverride ? [this.endpointOverride] : [...this.candidateEndpoints];
	}

	public async probe(): Promise<ConnectivityResult> {
		const result: ConnectivityResult = {
			isConnected: false,
			dnsOk: false,
			httpsOk: false,
			testedEndpoints: [],
		};

		this.logger.info('Starting connectivity check...');

		result.dnsOk = await this.checkDnsResolution(this.dnsHostname);
		if (!result.dnsOk) {
			result.error = 'DNS resolution failed';
			this.logger.error('DNS resolution check failed', undefined, { hostname: this.dnsHostname });
			return result;
		}

		return withNetworkClient(this.clientFactory, { timeoutMs: this.timeoutMs }, async (client) => {
			const started = Date.now();
			result.httpsOk = await this.checkEndpoint(client, this.referenceUrl);
			if (!result.httpsOk) {
				result.error = 'HTTPS connectivity check failed';
				this.logger.error('HTTPS connectivity check failed', undefined, { url: this.referenceUrl });
				return result;
			}
			result.latencyMs = Date.now() - started;
			this.logger.debug(`Latency to ${this.referenceUrl}: ${result.latencyMs}ms`);

			let reachable = false;
			for (const endpoint of this.getEndpoints()) {
				result.testedEndpoints.push(endpoint);
				if (await this.checkEndpoint(client, endpoint)) {
					reachable = true;
					this.logger.debug(`Successfully connected to: ${endpoint}`);
					break;
				}
			}

			if (!reachable) {
				result.error = this.endpointOverride
					? 'Failed to connect to override endpoint'
					: 'Failed to connect to any endpoint';
				this.logger.error(result.error, undefined, { testedEndpoints: result.testedEndpoints });
				return result;
			}

			result.isConnected = true;
			this.logger.info(`Connectivity check passed. Latency: ${result.latencyMs}ms`);
			return result;
		});
	}

	private async checkDnsResolution(hostname: string): Promise<boolean> {
		let timer: NodeJS.Timeout | undefined;
		const timeout = new Promise<never>((_, reject) => {
			timer = setTimeout(() => reject(new Error(`DNS lookup timed out after ${this.timeoutMs}ms`)), this.timeoutMs);
		});

		try {
			const address = await Promise.race([this.resolver(hostname), timeout]);
			this.logger.debug(`Resolved ${hostname} to ${address}`);
			return true;
		} catch (error) {
			this.logger.debug(`Failed to resolve hostname: ${hostname}`, { error: errorMessage(error) });
			return false;
		} finally {
			clearTimeout(timer);
		}
	}

	/**
	 * 2xx and 3xx count as reachable
	 */
	private async checkEndpoint(client: HttpClient, url: string): Promise<boolean> {
		try {
			const status = await client.head(url);
			if (status >= 200 && status < 400) {
				this.logger.debug(`Successfully connected to ${url} (HTTP ${status})`);
				return true;
			}
			this.logger.debug(`HTTP request to ${url} returned status: ${status}`);
			return false;
		} catch (error) {
			this.logger.debug(`Request to ${url} failed`, { error: errorMessage(error) });
			return false;
		}
	}
}
