/**
 * In-process CLI/PWD server for integration tests
 *
 * Listens on 127.0.0.1 with a random port, sends a greeting on connect and
 * answers each request line from a reply table.
 */

import * as net from 'net';

export const DEFAULT_GREETING = '200 mymail1.example CommuniGate Pro PWD Server 7.1.10 ready <50.123@mymail1.example>';

/**
 * Request line to reply line; null leaves the request unanswered
 */
export type ReplyTable = Record<string, string | null>;

export interface FakeCliServerOptions {
  greeting?: string;
  replies?: ReplyTable;
}

const LOGIN_REPLIES: ReplyTable = {
  'USER postmaster': '300 Enter password',
  'PASS test-secret': '200 login OK, proceed',
  INLINE: '200 OK',
  QUIT: null
};

export class FakeCliServer {
  /** Every request line received, in order, across connections */
  readonly received: string[] = [];
  /** Socket errors seen on the server side */
  readonly socketErrors: Error[] = [];
  private readonly server: net.Server;
  private readonly sockets = new Set<net.Socket>();
  private readonly greeting: string;
  private readonly replies: ReplyTable;

  constructor(options: FakeCliServerOptions = {}) {
    this.greeting = options.greeting ?? DEFAULT_GREETING;
    this.replies = { ...LOGIN_REPLIES, ...options.replies };
    this.server = net.createServer((socket) => this.handleConnection(socket));
  }

  /**
   * Starts listening and resolves with the bound port
   */
  listen(): Promise<number> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(0, '127.0.0.1', () => {
        const address = this.server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Server has no TCP address'));
          return;
        }
        resolve(address.port);
      });
    });
  }

  /**
   * Closes every client connection from the server side
   */
  dropConnections(): void {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();
  }

  close(): Promise<void> {
    this.dropConnections();
    return new Promise((resolve) => {
      this.server.close(() => resolve());
    });
  }

  private handleConnection(socket: net.Socket): void {
    this.sockets.add(socket);
    let buffer = '';

    socket.on('error', (err) => {
      this.socketErrors.push(err);
    });
    socket.on('close', () => {
      this.sockets.delete(socket);
    });
    socket.on('data', (chunk: Buffer) => {
      buffer += chunk.toString('utf8');
      let newline = buffer.indexOf('\n');
      while (newline !== -1) {
        const line = buffer.slice(0, newline).replace(/\r$/, '');
        buffer = buffer.slice(newline + 1);
        newline = buffer.indexOf('\n');
        this.handleLine(socket, line);
      }
    });

    socket.write(`${this.greeting}\r\n`);
  }

  private handleLine(socket: net.Socket, line: string): void {
    this.received.push(line);
    const reply = line in this.replies ? this.replies[line] : '500 Unknown command';
    if (reply !== null && socket.writable) {
      socket.write(`${reply}\r\n`);
    }
  }
}
