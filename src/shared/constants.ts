/**
 * Shared constants used across both the host and the device client
 */

// Network defaults
export const DEFAULT_SERVER_PORT = 9999;
export const DEFAULT_BIND_ADDRESS = '0.0.0.0';
export const DEFAULT_CLIENT_HOST = '127.0.0.1';

// Protocol limits
export const MAX_COMMAND_BYTES = 1024;

// Timeouts (ms)
export const DEFAULT_REQUEST_TIMEOUT_MS = 3000;
export const DEFAULT_POLL_TIMEOUT_MS = 2000;
export const DEFAULT_PROBE_TIMEOUT_MS = 2000;
export const DEFAULT_QUERY_TIMEOUT_MS = 5000;
export const DEFAULT_UNTERMINATED_FLUSH_MS = 50;

export const DEFAULT_POLL_INTERVAL_MS = 1000;

// mDNS service type, published as _remote-deck._tcp
export const MDNS_SERVICE_TYPE = 'remote-deck';
