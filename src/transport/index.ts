/**
 * Transport layer exports for cgp-cli
 */

export { CliConnection } from './connection.js';
export type { ConnectionState, CliConnectionEvents } from './connection.js';
