/**
 * CliClient - Public API for cgp-cli
 *
 * Opens an authenticated CLI/PWD session and exposes typed command helpers.
 *
 * @packageDocumentation
 */

import { EventEmitter } from 'events';
import { CliConnection } from './transport/connection.js';
import { CliProtocol, isIoError, type SubmissionOptions } from './protocol/cli-protocol.js';
import {
  projectArray,
  projectDictionary,
  projectInteger,
  projectText,
  projectTextDictionary,
  type Projector
} from './protocol/projectors.js';
import { CommandBuilder, buildApopDigest, domainOfAddress } from './commands/builder.js';
import { parseConfig } from './config.js';
import type { EncodableValue } from './encoding/cli-string.js';
import type { CliConfig, ResolvedCliConfig } from './types/config.js';
import {
  ResponseCode,
  type ParsedResponse,
  type SessionState,
  type SubmissionLevel,
  type SubmissionRecord
} from './types/protocol.js';
import type { PlainValue } from './types/value.js';
import {
  CliCommandError,
  CliExtractionError,
  CliNetworkError,
  CliProtocolError,
  CliResponseCodeError,
  CliSessionError
} from './types/errors.js';

/**
 * Options for {@link CliClient.sendTyped}
 */
export interface TypedCommandOptions<T> extends SubmissionOptions {
  /** Status codes that count as success; empty or absent accepts any */
  acceptableCodes?: readonly number[];
  /** Locates and converts the payload */
  project: Projector<T>;
  /** Fail when the payload is absent (default: true) */
  required?: boolean;
}

/**
 * Options for commands that return a string payload
 */
export interface StringCommandOptions extends SubmissionOptions {
  acceptableCodes?: readonly number[];
  required?: boolean;
}

const DATA_CODES: readonly number[] = [ResponseCode.OK, ResponseCode.OKDataProvided];
const OK_CODES: readonly number[] = [ResponseCode.OK];
const DOMAIN_SETTINGS_CODES: readonly number[] = [ResponseCode.OKDataProvided, ResponseCode.UnknownDomain];

/**
 * CliClient provides a Promise-based API over one CLI/PWD session.
 *
 * A session handles one request at a time; issue commands sequentially.
 *
 * Events:
 * - `submission` (record, level) after each exchange, except credential steps
 * - `connected` (summary) once the session is ready
 * - `error` (err) and `close` forwarded from the socket
 *
 * @example
 * ```typescript
 * const client = await CliClient.connect({
 *   host: 'mail.example.com',
 *   user: 'postmaster',
 *   password: 'secret',
 *   apop: true
 * });
 *
 * const accounts = await client.listAccounts('example.com');
 * await client.close();
 * ```
 */
export class CliClient extends EventEmitter {
  private config: ResolvedCliConfig;
  private connection: CliConnection | null = null;
  private protocol: CliProtocol | null = null;
  private _state: SessionState = 'disconnected';

  /**
   * Creates a new CliClient instance.
   * Use the static connect() method to create and connect in one step.
   *
   * @param config - Session configuration
   * @throws CliConfigError if the configuration is invalid
   */
  constructor(config: CliConfig) {
    super();
    this.config = parseConfig(config);
  }

  /**
   * Current session state
   */
  get state(): SessionState {
    return this._state;
  }

  /**
   * Whether the session accepts commands
   */
  get isReady(): boolean {
    return this._state === 'ready';
  }

  /**
   * Diagnostic snapshot of the last request/response pair. Replaced on every
   * call; copy it before the next command if it must be kept.
   */
  get lastSubmission(): SubmissionRecord | null {
    return this.protocol?.lastSubmission ?? null;
  }

  /**
   * Send/receive timeout in milliseconds
   */
  get timeout(): number {
    return this.config.timeout;
  }

  set timeout(value: number) {
    this.config = parseConfig({ ...this.config, timeout: value });
    this.protocol?.setDefaultTimeout(value);
  }

  /**
   * Creates a new CliClient and brings the session up.
   *
   * @param config - Session configuration
   * @returns Promise resolving to a ready CliClient
   * @throws CliConfigError if the configuration is invalid
   * @throws CliSessionError if connecting, the greeting, login or INLINE fails
   */
  static async connect(config: CliConfig): Promise<CliClient> {
    const client = new CliClient(config);
    await client.connectInternal();
    return client;
  }

  /**
   * Internal method to connect, check the greeting, log in and enter inline mode
   */
  private async connectInternal(): Promise<void> {
    const { host, port, user, apop, timeout } = this.config;
    const log: string[] = [`HostOrIP: ${host}; Port: ${port}; Username: ${user}; APOP: ${apop}.`];

    try {
      this.connection = new CliConnection({ host, port, timeout });
      await this.connection.connect();
      this._state = 'connected';
      log.push('Connected. Reading server greeting...');

      const protocol = new CliProtocol(this.connection, { timeout });
      this.protocol = protocol;
      this.setupProtocolListeners(protocol);

      const greeting = await protocol.readResponse('greeting');
      if (greeting.statusCode !== ResponseCode.OK) {
        throw new CliProtocolError(`Unexpected server greeting: ${greeting.raw}`, greeting.raw);
      }
      log.push(`Got greeting: '${greeting.raw}'.`);

      if (apop) {
        log.push('Logging in with APOP hash...');
        await this.loginApop(protocol, greeting);
      } else {
        log.push('Logging in with plaintext credentials...');
        await this.loginPlaintext(protocol);
      }
      this._state = 'authenticated';

      const inline = await protocol.sendAndParse(CommandBuilder.inline());
      if (inline.statusCode !== ResponseCode.OK) {
        throw new CliProtocolError(
          `Inline command mode not accepted. Error: ${inline.raw}`,
          inline.raw,
          CommandBuilder.inline()
        );
      }
      this._state = 'ready';
    } catch (err) {
      this._state = 'faulted';
      this.connection?.destroy();
      const detail = err instanceof Error ? err.message : String(err);
      throw new CliSessionError(`${detail} ${log.join(' ')}`, host, port, err);
    }

    this.emit('connected', log.join(' '));
  }

  private setupProtocolListeners(protocol: CliProtocol): void {
    protocol.on('submission', (record: SubmissionRecord, level: SubmissionLevel) => {
      this.emit('submission', record, level);
    });

    protocol.on('error', (err: Error) => {
      if (this._state !== 'closed') {
        this._state = 'faulted';
      }
      // Only surface socket errors to callers who listen for them
      if (this.listenerCount('error') > 0) {
        this.emit('error', err);
      }
    });

    protocol.on('close', () => {
      if (this._state !== 'closed') {
        this._state = 'faulted';
      }
      this.emit('close');
    });
  }

  /**
   * USER, then PASS unless the server already accepted the login
   */
  private async loginPlaintext(protocol: CliProtocol): Promise<void> {
    const { user, password } = this.config;

    const userResponse = await protocol.sendAndParse(CommandBuilder.user(user));
    if (
      userResponse.statusCode !== ResponseCode.OK &&
      userResponse.statusCode !== ResponseCode.OKPleaseProvideData
    ) {
      throw new CliProtocolError(`API user ${user} login not allowed: ${userResponse.raw}`, userResponse.raw, 'USER');
    }

    const passResponse = await protocol.sendAndParse(CommandBuilder.pass(password), { suppressLog: true });
    if (passResponse.statusCode !== ResponseCode.OK) {
      throw new CliProtocolError(`API user ${user} password not accepted: ${passResponse.raw}`, passResponse.raw, 'PASS');
    }
  }

  /**
   * APOP with the MD5 of the greeting's session id and the password
   */
  private async loginApop(protocol: CliProtocol, greeting: ParsedResponse): Promise<void> {
    const { user, password } = this.config;

    const sessionId = findSessionId(greeting);
    if (sessionId === undefined) {
      throw new CliProtocolError(`Server greeting carries no APOP session id: ${greeting.raw}`, greeting.raw);
    }

    const digest = buildApopDigest(sessionId, password);
    const response = await protocol.sendAndParse(CommandBuilder.apop(user, digest), { suppressLog: true });
    if (response.statusCode !== ResponseCode.OK) {
      throw new CliProtocolError(`API user ${user} APOP hash not accepted: ${response.raw}`, response.raw, 'APOP');
    }
  }

  /**
   * Sends a raw command line and returns its parsed response, whatever the
   * status code.
   *
   * @param command - Request line without CRLF
   * @param options - Diagnostic labels and timeout override
   * @throws CliNetworkError if the session is not ready or the socket fails
   * @throws CliTimeoutError if no response arrives in time
   * @throws CliParseError if the response is malformed
   */
  async send(command: string, options?: SubmissionOptions): Promise<ParsedResponse> {
    const protocol = this.protocol;
    if (!protocol || this._state !== 'ready') {
      throw new CliNetworkError(
        `Cannot send command: session is ${this._state}`,
        this.config.host,
        this.config.port
      );
    }

    try {
      return await protocol.sendAndParse(command, options);
    } catch (err) {
      if (isIoError(err)) {
        this._state = 'faulted';
      }
      throw err;
    }
  }

  /**
   * Sends a command, checks its status code and projects its payload.
   *
   * @param command - Request line without CRLF
   * @param options - Acceptable codes, projector and diagnostic labels
   * @returns The projected payload; null only when `required` is false
   * @throws CliCommandError wrapping the classification, extraction,
   *   parse or I/O failure, with the command and raw response attached
   */
  async sendTyped<T>(command: string, options: TypedCommandOptions<T> & { required: false }): Promise<T | null>;
  async sendTyped<T>(command: string, options: TypedCommandOptions<T>): Promise<T>;
  async sendTyped<T>(command: string, options: TypedCommandOptions<T>): Promise<T | null> {
    const acceptableCodes = options.acceptableCodes ?? [];
    const required = options.required ?? true;
    let response: ParsedResponse | undefined;

    try {
      response = await this.send(command, options);

      if (acceptableCodes.length > 0 && !acceptableCodes.includes(response.statusCode)) {
        throw new CliResponseCodeError(response.statusCode, acceptableCodes, response.raw, command);
      }

      const result = options.project(response);
      if (result === undefined) {
        if (required) {
          throw new CliExtractionError('Response null or unexpected type', response.raw, command);
        }
        return null;
      }
      return result;
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new CliCommandError(
        `${detail}; command: ${command}; acceptable codes: [${acceptableCodes.join(', ')}]; response: ${response?.raw ?? ''}`,
        command,
        acceptableCodes,
        response?.raw,
        err
      );
    }
  }

  /**
   * Sends a command and returns its first string payload
   */
  async sendCommandGetString(command: string, options: StringCommandOptions & { required: false }): Promise<string | null>;
  async sendCommandGetString(command: string, options?: StringCommandOptions): Promise<string>;
  async sendCommandGetString(command: string, options?: StringCommandOptions): Promise<string | null> {
    if (options?.required === false) {
      return this.sendTyped(command, { ...options, required: false, project: projectText });
    }
    return this.sendTyped(command, { ...options, project: projectText });
  }

  /**
   * Lists the accounts of a domain
   *
   * @param domain - Domain name
   * @returns Account name (local part) to account type, e.g. `{ user: 'macnt' }`
   */
  async listAccounts(domain: string): Promise<Record<string, string>> {
    return this.sendTyped(CommandBuilder.listAccounts(domain), {
      domainName: domain,
      commandType: 'ListAccounts',
      acceptableCodes: DATA_CODES,
      project: projectTextDictionary
    });
  }

  /**
   * Returns the effective settings of an account
   */
  async getAccountEffectiveSettings(address: string): Promise<Record<string, PlainValue>> {
    return this.sendTyped(CommandBuilder.getAccountEffectiveSettings(address), {
      domainName: domainOfAddress(address),
      commandType: 'GetAccountEffectiveSettings',
      acceptableCodes: DATA_CODES,
      project: projectDictionary
    });
  }

  /**
   * Returns the effective settings of a domain
   */
  async getDomainEffectiveSettings(domain: string): Promise<Record<string, PlainValue>> {
    return this.sendTyped(CommandBuilder.getDomainEffectiveSettings(domain), {
      domainName: domain,
      commandType: 'GetDomainEffectiveSettings',
      acceptableCodes: DATA_CODES,
      project: projectDictionary
    });
  }

  /**
   * Returns the settings of a domain, or null if the domain does not exist
   *
   * @throws CliCommandError for any status other than 201 or 512, or when a
   *   201 response carries no dictionary
   */
  async getDomainSettings(domain: string): Promise<Record<string, PlainValue> | null> {
    return this.sendTyped(CommandBuilder.getDomainSettings(domain), {
      domainName: domain,
      commandType: 'GetDomainSettings',
      acceptableCodes: DOMAIN_SETTINGS_CODES,
      project: (response) =>
        response.statusCode === ResponseCode.UnknownDomain ? null : projectDictionary(response)
    });
  }

  /**
   * Renames a domain
   */
  async renameDomain(domain: string, newName: string): Promise<void> {
    await this.sendTyped(CommandBuilder.renameDomain(domain, newName), {
      domainName: domain,
      commandType: 'RenameDomain',
      acceptableCodes: OK_CODES,
      project: projectText,
      required: false
    });
  }

  /**
   * Updates domain settings; only the given keys change
   */
  async updateDomainSettings(domain: string, settings: Record<string, EncodableValue>): Promise<void> {
    await this.sendTyped(CommandBuilder.updateDomainSettings(domain, settings), {
      domainName: domain,
      commandType: 'UpdateDomainSettings',
      acceptableCodes: OK_CODES,
      project: projectText,
      required: false
    });
  }

  /**
   * Returns the mail processing rules of an account
   */
  async getAccountRules(address: string): Promise<PlainValue[]> {
    return this.sendTyped(CommandBuilder.getAccountRules(address), {
      domainName: domainOfAddress(address),
      commandType: 'GetAccountRules',
      acceptableCodes: DATA_CODES,
      project: projectArray
    });
  }

  /**
   * Returns the storage used by an account, in bytes; a bigint past 2^53
   */
  async getAccountStorageUsed(address: string): Promise<number | bigint> {
    return this.sendTyped(CommandBuilder.getAccountInfo(address, 'StorageUsed'), {
      domainName: domainOfAddress(address),
      commandType: 'GetAccountInfo',
      acceptableCodes: DATA_CODES,
      project: projectInteger
    });
  }

  /**
   * Sends QUIT and closes the socket. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this._state === 'closed') {
      return;
    }

    const connection = this.connection;
    const protocol = this.protocol;
    this._state = 'closed';

    if (!connection) {
      return;
    }

    if (protocol && connection.isConnected) {
      protocol.sendLineNoReply(CommandBuilder.quit());
    }
    await connection.disconnect();
  }

  /**
   * Alias for {@link close}
   */
  async end(): Promise<void> {
    await this.close();
  }
}

/**
 * The first top-level greeting value that starts with '<'
 */
export function findSessionId(greeting: ParsedResponse): string | undefined {
  for (const value of greeting.root) {
    if (value.kind === 'string' && value.value.startsWith('<')) {
      return value.value;
    }
  }
  return undefined;
}
