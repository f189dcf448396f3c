/**
 * CLI Protocol Layer
 *
 * Wraps the transport connection and runs the strict one-request,
 * one-response cycle: line framing, response timeouts, parsing, and the
 * per-session submission record.
 *
 * @packageDocumentation
 */

import { EventEmitter } from 'events';
import { CliConnection } from '../transport/connection.js';
import { parseResponse } from './parser.js';
import type { ParsedResponse, SubmissionLevel, SubmissionRecord } from '../types/protocol.js';
import { DEFAULT_TIMEOUT } from '../types/config.js';
import {
  CliNetworkError,
  CliProtocolError,
  CliTimeoutError
} from '../types/errors.js';

/**
 * Line reader waiting for the next response line
 */
interface PendingLine {
  operation: string;
  resolve: (line: string) => void;
  reject: (error: Error) => void;
  timeoutId?: NodeJS.Timeout;
}

/**
 * Diagnostic labels attached to a request
 */
export interface SubmissionOptions {
  /** Domain the command concerns */
  domainName?: string;
  /** Short command label, e.g. 'ListAccounts' */
  commandType?: string;
  /** Keep the exchange out of the emitted submission events (credentials) */
  suppressLog?: boolean;
  /** Response timeout override in milliseconds */
  timeout?: number;
}

const LF = 0x0a;

function describeError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`;
  }
  return String(err);
}

/**
 * Whether an error means the byte stream can no longer be trusted
 */
export function isIoError(err: unknown): err is CliNetworkError | CliTimeoutError {
  return err instanceof CliNetworkError || err instanceof CliTimeoutError;
}

/**
 * CliProtocol class wrapping connection
 * Frames response lines, correlates each request with the next line,
 * and records the last exchange.
 */
export class CliProtocol extends EventEmitter {
  private connection: CliConnection;
  private buffer: Buffer = Buffer.alloc(0);
  private lines: string[] = [];
  private pending: PendingLine | null = null;
  private inFlight = false;
  private defaultTimeout: number;
  private fault: Error | null = null;
  private _lastSubmission: SubmissionRecord | null = null;

  constructor(connection: CliConnection, options?: { timeout?: number }) {
    super();
    this.connection = connection;
    this.defaultTimeout = options?.timeout ?? DEFAULT_TIMEOUT;
    this.setupConnectionListeners();
  }

  /**
   * Get the underlying connection
   */
  getConnection(): CliConnection {
    return this.connection;
  }

  /**
   * Snapshot of the most recent request/response pair, replaced on every call
   */
  get lastSubmission(): SubmissionRecord | null {
    return this._lastSubmission;
  }

  /**
   * The error that made the stream unusable, if any
   */
  get faultError(): Error | null {
    return this.fault;
  }

  /**
   * Setup listeners for connection events
   */
  private setupConnectionListeners(): void {
    this.connection.on('data', (chunk: Buffer) => {
      this.handleData(chunk);
    });

    this.connection.on('error', (err: Error) => {
      this.markFaulted(err);
      this.emit('error', err);
    });

    this.connection.on('close', () => {
      this.markFaulted(new CliNetworkError(
        'Connection closed by server',
        this.connection.host,
        this.connection.port
      ));
      this.emit('close');
    });
  }

  /**
   * Record the fault and fail whoever is waiting for a line
   */
  private markFaulted(err: Error): void {
    if (!this.fault) {
      this.fault = err;
    }
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      if (pending.timeoutId) {
        clearTimeout(pending.timeoutId);
      }
      pending.reject(err);
    }
  }

  /**
   * Handle incoming data from connection
   */
  private handleData(chunk: Buffer): void {
    this.buffer = Buffer.concat([this.buffer, chunk]);

    let lineEnd: number;
    while ((lineEnd = this.buffer.indexOf(LF)) !== -1) {
      let line = this.buffer.subarray(0, lineEnd).toString('utf8');
      this.buffer = this.buffer.subarray(lineEnd + 1);
      if (line.endsWith('\r')) {
        line = line.slice(0, -1);
      }
      this.deliverLine(line);
    }
  }

  private deliverLine(line: string): void {
    const pending = this.pending;
    if (!pending) {
      this.lines.push(line);
      return;
    }
    this.pending = null;
    if (pending.timeoutId) {
      clearTimeout(pending.timeoutId);
    }
    pending.resolve(line);
  }

  /**
   * Wait for the next response line
   *
   * @param operation - Label used in timeout errors
   * @param timeout - Timeout override in milliseconds
   * @throws CliTimeoutError if no line arrives in time
   * @throws CliNetworkError if the connection fails or is closed
   */
  readLine(operation: string, timeout?: number): Promise<string> {
    return new Promise((resolve, reject) => {
      const queued = this.lines.shift();
      if (queued !== undefined) {
        resolve(queued);
        return;
      }

      if (this.fault) {
        reject(this.fault);
        return;
      }

      if (this.pending) {
        reject(new CliProtocolError('Another read is already waiting for a response', '', operation));
        return;
      }

      const ms = timeout ?? this.defaultTimeout;
      const pending: PendingLine = { operation, resolve, reject };

      if (ms > 0) {
        pending.timeoutId = setTimeout(() => {
          this.pending = null;
          const err = new CliTimeoutError(
            `Timed out after ${ms}ms waiting for response to: ${operation}`,
            operation,
            ms
          );
          // A late reply would be taken for the answer to the next request
          this.markFaulted(err);
          reject(err);
        }, ms);
      }

      this.pending = pending;
    });
  }

  /**
   * Read and parse the next line (used for the server greeting)
   */
  async readResponse(operation: string, timeout?: number): Promise<ParsedResponse> {
    const line = await this.readLine(operation, timeout);
    return parseResponse(line);
  }

  /**
   * Send one request line and parse the single response line it produces
   *
   * Every call replaces {@link lastSubmission}. When the exchange fails the
   * record's response holds the error detail followed by any raw response.
   *
   * @param request - Request line without CRLF
   * @param options - Diagnostic labels and timeout
   * @returns Parsed response
   * @throws CliProtocolError if a request is already in flight
   * @throws CliNetworkError, CliTimeoutError, CliParseError
   */
  async sendAndParse(request: string, options?: SubmissionOptions): Promise<ParsedResponse> {
    if (this.inFlight) {
      throw new CliProtocolError('Another request is already in progress', '', request);
    }
    if (this.fault) {
      throw new CliNetworkError(
        `Connection is unusable: ${this.fault.message}`,
        this.connection.host,
        this.connection.port,
        this.fault
      );
    }

    const record: SubmissionRecord = {
      sentAt: new Date(),
      serverAddress: this.connection.host,
      domainName: options?.domainName,
      commandType: options?.commandType ?? '',
      request
    };
    this._lastSubmission = record;
    let logged = options?.suppressLog ?? false;

    this.inFlight = true;
    try {
      this.connection.sendLine(request);
      record.response = await this.readLine(request, options?.timeout);
      record.receivedAt = new Date();
      return parseResponse(record.response);
    } catch (err) {
      if (isIoError(err)) {
        this.markFaulted(err);
      }
      record.response = `${describeError(err)}. Raw response: ${record.response ?? ''}`;
      if (!logged) {
        this.emitSubmission(record, 'error');
        logged = true;
      }
      throw err;
    } finally {
      this.inFlight = false;
      if (!logged) {
        this.emitSubmission(record, 'info');
      }
    }
  }

  /**
   * Write a line without waiting for a reply (QUIT)
   */
  sendLineNoReply(line: string): void {
    this.connection.sendLine(line);
  }

  private emitSubmission(record: SubmissionRecord, level: SubmissionLevel): void {
    this.emit('submission', record, level);
  }

  /**
   * Set the default timeout for operations
   *
   * @param timeout - Timeout in milliseconds
   */
  setDefaultTimeout(timeout: number): void {
    this.defaultTimeout = timeout;
  }

  /**
   * Get the default timeout
   */
  getDefaultTimeout(): number {
    return this.defaultTimeout;
  }
}
