/**
 * Transport integration tests
 *
 * CliConnection against raw in-process TCP servers: connect failures and
 * writes the peer never drains.
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as net from 'net';
import { CliConnection } from '../../src/transport/connection.js';
import { CliNetworkError, CliTimeoutError } from '../../src/types/errors.js';

interface RawServer {
  server: net.Server;
  sockets: Set<net.Socket>;
  port: number;
}

/**
 * Listens on a random port; accepted sockets are paused and never read
 */
function listenPaused(): Promise<RawServer> {
  const sockets = new Set<net.Socket>();
  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.on('error', () => socket.destroy());
    socket.pause();
  });
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Server has no TCP address'));
        return;
      }
      resolve({ server, sockets, port: address.port });
    });
  });
}

function closeServer(raw: RawServer): Promise<void> {
  for (const socket of raw.sockets) {
    socket.destroy();
  }
  return new Promise((resolve) => raw.server.close(() => resolve()));
}

describe('CliConnection', () => {
  let raw: RawServer | null = null;
  let connection: CliConnection | null = null;

  afterEach(async () => {
    connection?.destroy();
    connection = null;
    if (raw) {
      await closeServer(raw);
      raw = null;
    }
  });

  it('should time out a write the server never reads and close the socket', async () => {
    raw = await listenPaused();
    const conn = new CliConnection({ host: '127.0.0.1', port: raw.port, timeout: 300 });
    connection = conn;
    await conn.connect();
    expect(conn.state).toBe('connected');

    const errors: Error[] = [];
    conn.on('error', (err: Error) => errors.push(err));
    const closed = new Promise<void>((resolve) => conn.once('close', () => resolve()));

    conn.send(Buffer.alloc(64 * 1024 * 1024));
    await closed;

    const timeout = errors[0];
    expect(timeout).toBeInstanceOf(CliTimeoutError);
    if (timeout instanceof CliTimeoutError) {
      expect(timeout.operation).toBe('write');
      expect(timeout.timeoutMs).toBe(300);
      expect(timeout.message).toBe('Timed out after 300ms writing to the server');
    }
    expect(conn.state).toBe('disconnected');
    expect(conn.isConnected).toBe(false);
    expect(() => conn.send('NOOP\r\n')).toThrow(CliNetworkError);
  });

  it('should not time out writes the kernel accepts', async () => {
    raw = await listenPaused();
    const conn = new CliConnection({ host: '127.0.0.1', port: raw.port, timeout: 100 });
    connection = conn;
    await conn.connect();

    const errors: Error[] = [];
    conn.on('error', (err: Error) => errors.push(err));
    conn.sendLine('GetServerInfo');
    await new Promise((resolve) => setTimeout(resolve, 250));

    expect(errors).toEqual([]);
    expect(conn.state).toBe('connected');
  });

  it('should reject a second connect while connected', async () => {
    raw = await listenPaused();
    const conn = new CliConnection({ host: '127.0.0.1', port: raw.port, timeout: 1000 });
    connection = conn;
    await conn.connect();

    await expect(conn.connect()).rejects.toThrow('Cannot connect: connection is connected');
    expect(conn.state).toBe('connected');
  });

  it('should reject with CliNetworkError when the port is closed', async () => {
    const closedPort = await listenPaused();
    const { port } = closedPort;
    await closeServer(closedPort);

    const conn = new CliConnection({ host: '127.0.0.1', port, timeout: 1000 });
    connection = conn;

    await expect(conn.connect()).rejects.toBeInstanceOf(CliNetworkError);
    expect(conn.state).toBe('disconnected');
  });
});
