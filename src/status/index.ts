export * from './types';
export { StatusPublisher, DEFAULT_STATUS_FILE, defaultMessageFor, formatStatusTimestamp, toStatusDocument } from './status-publisher';
