export { ConnectivityProbe, normalizeEndpoint, DEFAULT_CANDIDATE_ENDPOINTS } from './connectivity-probe';
export type { ConnectivityProbeOptions } from './connectivity-probe';
export { NetworkClient, createNetworkClient, withNetworkClient } from './http-client';
export type { HttpClient, HttpClientFactory, NetworkClientOptions } from './http-client';
export type { ConnectivityResult, HostResolver } from './types';
