/**
 * Type exports for cgp-cli
 */

// Configuration types
export type { CliConfig, ResolvedCliConfig, ConnectionOptions } from './config.js';
export { cliConfigSchema, DEFAULT_PORT, DEFAULT_TIMEOUT } from './config.js';

// Value model
export type {
  CliValue,
  CliValueKind,
  CliValueOf,
  CliString,
  CliInteger,
  CliNull,
  CliIpAddress,
  CliTimestamp,
  CliDataBlock,
  CliArray,
  CliDictionary,
  PlainValue
} from './value.js';

// Protocol types
export type {
  ParsedResponse,
  SubmissionRecord,
  SessionState,
  SubmissionLevel
} from './protocol.js';
export { ResponseCode } from './protocol.js';

// Error types
export {
  CliError,
  CliParseError,
  CliProtocolError,
  CliResponseCodeError,
  CliExtractionError,
  CliNetworkError,
  CliTimeoutError,
  CliConfigError,
  CliSessionError,
  CliCommandError
} from './errors.js';

export type { ErrorSource, ParsePosition } from './errors.js';
