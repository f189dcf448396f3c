/**
 * Transport layer for cgp-cli
 *
 * One plain TCP socket to the CLI/PWD port. Connecting and every write are
 * bounded by the session timeout; reads are timed by the protocol layer,
 * which knows when a response is due.
 */

import { EventEmitter } from 'events';
import * as net from 'net';
import type { ConnectionOptions } from '../types/config.js';
import { CliNetworkError, CliTimeoutError } from '../types/errors.js';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'disconnecting';

/**
 * Events a CliConnection emits
 */
export interface CliConnectionEvents {
  data: (chunk: Buffer) => void;
  /** CliNetworkError for socket failures, CliTimeoutError for a stalled write */
  error: (err: Error) => void;
  close: () => void;
  connect: () => void;
}

/**
 * Grace period before a socket that has not closed after end() is destroyed
 */
const FORCE_CLOSE_DELAY = 1000;

/**
 * TCP connection to a CLI server
 */
export class CliConnection extends EventEmitter {
  private socket: net.Socket | null = null;
  private readonly options: ConnectionOptions;
  private _state: ConnectionState = 'disconnected';
  /** Timers for writes the kernel has not accepted yet */
  private readonly writeTimers = new Set<NodeJS.Timeout>();

  constructor(options: ConnectionOptions) {
    super();
    this.options = { ...options };
  }

  get state(): ConnectionState {
    return this._state;
  }

  get isConnected(): boolean {
    return this._state === 'connected';
  }

  get host(): string {
    return this.options.host;
  }

  get port(): number {
    return this.options.port;
  }

  private networkError(message: string, cause?: Error): CliNetworkError {
    return new CliNetworkError(message, this.options.host, this.options.port, cause);
  }

  /**
   * Opens the socket
   *
   * @throws CliNetworkError when the connection is refused or fails
   * @throws CliTimeoutError when it is not established within the timeout
   */
  connect(): Promise<void> {
    if (this._state !== 'disconnected') {
      return Promise.reject(this.networkError(`Cannot connect: connection is ${this._state}`));
    }
    this._state = 'connecting';

    return new Promise((resolve, reject) => {
      const { host, port, timeout } = this.options;
      let timer: NodeJS.Timeout | undefined;

      const fail = (err: Error) => {
        clearTimeout(timer);
        this.socket?.destroy();
        this.socket = null;
        this._state = 'disconnected';
        reject(err);
      };

      const socket = net.createConnection({ host, port }, () => {
        clearTimeout(timer);
        socket.removeListener('error', onConnectError);
        this._state = 'connected';
        this.attach(socket);
        this.emit('connect');
        resolve();
      });
      const onConnectError = (err: Error) => fail(this.networkError(`Connection failed: ${err.message}`, err));
      socket.once('error', onConnectError);
      this.socket = socket;

      if (timeout > 0) {
        timer = setTimeout(() => {
          socket.removeListener('error', onConnectError);
          fail(new CliTimeoutError(`Connection timed out after ${timeout}ms`, 'connect', timeout));
        }, timeout);
      }
    });
  }

  /**
   * Forwards socket events once the connection is up
   */
  private attach(socket: net.Socket): void {
    socket.on('data', (chunk: Buffer) => this.emit('data', chunk));

    socket.on('error', (err: Error) => {
      this.emit('error', this.networkError(`Socket error: ${err.message}`, err));
    });

    // The server half-closed; 'close' follows
    socket.on('end', () => {
      this._state = 'disconnected';
    });

    socket.on('close', () => {
      this.clearWriteTimers();
      this._state = 'disconnected';
      if (this.socket === socket) {
        this.socket = null;
      }
      this.emit('close');
    });
  }

  private clearWriteTimers(): void {
    for (const timer of this.writeTimers) {
      clearTimeout(timer);
    }
    this.writeTimers.clear();
  }

  /**
   * Ends the socket and resolves once it has closed
   */
  disconnect(): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.destroyed) {
      this.socket = null;
      this._state = 'disconnected';
      return Promise.resolve();
    }

    this._state = 'disconnecting';
    return new Promise((resolve) => {
      const forceTimer = setTimeout(() => socket.destroy(), FORCE_CLOSE_DELAY);
      socket.once('close', () => {
        clearTimeout(forceTimer);
        resolve();
      });
      socket.end();
    });
  }

  /**
   * Tears the socket down immediately
   */
  destroy(): void {
    this.clearWriteTimers();
    this.socket?.destroy();
    this.socket = null;
    this._state = 'disconnected';
  }

  /**
   * Writes raw data. A write the kernel has not accepted within the timeout
   * destroys the socket and emits a CliTimeoutError.
   *
   * @throws CliNetworkError if not connected
   */
  send(data: string | Buffer): void {
    const socket = this.socket;
    if (!socket || this._state !== 'connected') {
      throw this.networkError('Cannot send data: not connected');
    }

    const { timeout } = this.options;
    if (timeout <= 0) {
      socket.write(data);
      return;
    }

    const timer = setTimeout(() => {
      this.writeTimers.delete(timer);
      this.emit('error', new CliTimeoutError(`Timed out after ${timeout}ms writing to the server`, 'write', timeout));
      socket.destroy();
    }, timeout);
    this.writeTimers.add(timer);

    socket.write(data, () => {
      clearTimeout(timer);
      this.writeTimers.delete(timer);
    });
  }

  /**
   * Writes a line followed by CRLF
   */
  sendLine(line: string): void {
    this.send(line + '\r\n');
  }
}
