/**
 * Connectivity types
 */

export interface ConnectivityResult {
	isConnected: boolean;
	dnsOk: boolean;
	httpsOk: boolean;
	/** Round trip of the reference HTTPS request, set once it succeeded */
	latencyMs?: number;
	/** Every endpoint attempted in step 4, in order */
	testedEndpoints: string[];
	error?: string;
}

/**
 * Resolves a hostname to an address; rejects when it cannot
 */
export type HostResolver = (hostname: string) => Promise<string>;
