/**
 * cgp-cli - A TypeScript client for the CommuniGate Pro CLI/PWD administration protocol
 *
 * @packageDocumentation
 */

// Export all types
export * from './types/index.js';

// Configuration loading
export { parseConfig, loadConfigFromEnv } from './config.js';

// Wire encoding
export * from './encoding/index.js';

// Protocol layer
export * from './protocol/index.js';

// Command layer
export * from './commands/index.js';

// Transport layer
export * from './transport/index.js';

// Public API
export {
  CliClient,
  findSessionId,
  type TypedCommandOptions,
  type StringCommandOptions
} from './client.js';
