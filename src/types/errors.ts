/**
 * Error types for cgp-cli
 */

/**
 * Error source categories
 */
export type ErrorSource = 'protocol' | 'network' | 'parse' | 'timeout' | 'config';

/**
 * Base CLI error class
 */
export class CliError extends Error {
  /** Error code */
  code: string;
  /** Error source category */
  source: ErrorSource;
  /** Command that caused the error (if applicable) */
  command?: string;
  /** Raw server response line (if applicable) */
  response?: string;

  constructor(message: string, code: string, source: ErrorSource) {
    super(message);
    this.name = 'CliError';
    this.code = code;
    this.source = source;
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Position of a lexical or grammar error inside a response line.
 * `line` and `column` are 1-based.
 */
export interface ParsePosition {
  line: number;
  column: number;
  /** Input starting at the offending position */
  fragment: string;
}

/**
 * Parse error (malformed response line)
 */
export class CliParseError extends CliError {
  override source: 'parse' = 'parse';
  /** Raw data that failed to parse */
  rawData: string;
  line?: number;
  column?: number;
  fragment?: string;

  constructor(message: string, rawData: string, position?: ParsePosition) {
    super(message, 'PARSE_ERROR', 'parse');
    this.name = 'CliParseError';
    this.rawData = rawData;
    this.response = rawData;
    if (position) {
      this.line = position.line;
      this.column = position.column;
      this.fragment = position.fragment;
    }
  }
}

/**
 * Protocol error: the server answered a bring-up step with an unexpected
 * status code, or the request cycle was misused.
 */
export class CliProtocolError extends CliError {
  override source: 'protocol' = 'protocol';
  /** Server response text */
  serverResponse: string;

  constructor(message: string, serverResponse: string, command?: string) {
    super(message, 'PROTOCOL_ERROR', 'protocol');
    this.name = 'CliProtocolError';
    this.serverResponse = serverResponse;
    this.command = command;
    this.response = serverResponse;
  }
}

/**
 * Classification error: the status code is not among the codes the caller accepts
 */
export class CliResponseCodeError extends CliProtocolError {
  /** Status code the server answered with (-1 when the line had none) */
  statusCode: number;
  /** Codes the caller would have accepted */
  acceptableCodes: readonly number[];

  constructor(statusCode: number, acceptableCodes: readonly number[], serverResponse: string, command?: string) {
    super(
      `Response code ${statusCode} is not one of [${acceptableCodes.join(', ')}]`,
      serverResponse,
      command
    );
    this.name = 'CliResponseCodeError';
    this.code = 'UNACCEPTABLE_RESPONSE_CODE';
    this.statusCode = statusCode;
    this.acceptableCodes = acceptableCodes;
  }
}

/**
 * Extraction error: the response carries no payload of the expected shape
 */
export class CliExtractionError extends CliError {
  override source: 'parse' = 'parse';

  constructor(message: string, serverResponse: string, command?: string) {
    super(message, 'EXTRACTION_ERROR', 'parse');
    this.name = 'CliExtractionError';
    this.response = serverResponse;
    this.command = command;
  }
}

/**
 * Network error (connection failure, socket error)
 */
export class CliNetworkError extends CliError {
  override source: 'network' = 'network';
  /** Server host */
  host: string;
  /** Server port */
  port: number;

  constructor(message: string, host: string, port: number, cause?: Error) {
    super(message, 'NETWORK_ERROR', 'network');
    this.name = 'CliNetworkError';
    this.host = host;
    this.port = port;
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * Timeout error (socket wait took too long)
 */
export class CliTimeoutError extends CliError {
  override source: 'timeout' = 'timeout';
  /** Operation that timed out */
  operation: string;
  /** Timeout duration in milliseconds */
  timeoutMs: number;

  constructor(message: string, operation: string, timeoutMs: number) {
    super(message, 'TIMEOUT_ERROR', 'timeout');
    this.name = 'CliTimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Configuration error (invalid connection settings)
 */
export class CliConfigError extends CliError {
  override source: 'config' = 'config';
  /** One entry per failing field, formatted as `path: message` */
  issues: string[];

  constructor(message: string, issues: string[]) {
    super(message, 'CONFIG_ERROR', 'config');
    this.name = 'CliConfigError';
    this.issues = issues;
  }
}

function sourceOf(cause: unknown): ErrorSource {
  return cause instanceof CliError ? cause.source : 'protocol';
}

/**
 * Session establishment failed. The message carries the bring-up log;
 * the failing step is kept as `cause`.
 */
export class CliSessionError extends CliError {
  host: string;
  port: number;

  constructor(message: string, host: string, port: number, cause: unknown) {
    super(message, 'SESSION_ERROR', sourceOf(cause));
    this.name = 'CliSessionError';
    this.host = host;
    this.port = port;
    this.cause = cause;
    if (cause instanceof CliError) {
      this.command = cause.command;
      this.response = cause.response;
    }
  }
}

/**
 * Command-layer failure. Wraps whatever went wrong while sending a command,
 * classifying its response or extracting its payload.
 */
export class CliCommandError extends CliError {
  /** Codes the caller would have accepted (empty means any) */
  acceptableCodes: readonly number[];

  constructor(
    message: string,
    command: string,
    acceptableCodes: readonly number[],
    response: string | undefined,
    cause: unknown
  ) {
    super(message, 'COMMAND_ERROR', sourceOf(cause));
    this.name = 'CliCommandError';
    this.command = command;
    this.acceptableCodes = acceptableCodes;
    this.response = response;
    this.cause = cause;
  }
}
