export * from './types';
export { DeviceIdentityStore, DEVICE_CONFIG_TABLE, DEVICE_IDENTIFIERS_TABLE } from './identity-store';
