/**
 * TCP transport over node:net sockets
 */

import { connect as netConnect, createServer, type Server, type Socket } from 'node:net';
import { TransportError } from '../error.js';
import type { Transport, TransportOptions } from './types.js';

const DEFAULT_HOST = '127.0.0.1';
const DEFAULT_CONNECT_TIMEOUT = 10000;

type Waiter = {
  resolve: (chunk: Uint8Array | null) => void;
  reject: (error: Error) => void;
};

/**
 * Adapts a connected socket to the pull-based Transport interface
 */
export class SocketTransport implements Transport {
  private readonly inbox: Uint8Array[] = [];
  private readonly waiters: Waiter[] = [];
  private ended = false;
  private failure: TransportError | null = null;

  constructor(private readonly socket: Socket) {
    socket.on('data', (chunk: Buffer) => {
      const bytes = new Uint8Array(chunk);
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter.resolve(bytes);
      } else {
        this.inbox.push(bytes);
      }
    });
    socket.on('end', () => this.finish());
    socket.on('close', () => this.finish());
    socket.on('error', (error: Error) => {
      this.failure = new TransportError(`Socket error: ${error.message}`, {
        remote: `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`,
      });
      for (const waiter of this.waiters.splice(0)) {
        waiter.reject(this.failure);
      }
    });
  }

  async write(data: Uint8Array): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    if (this.socket.destroyed || this.socket.writableEnded) {
      throw new TransportError('Socket is closed');
    }
    await new Promise<void>((resolve, reject) => {
      this.socket.write(data, error => {
        if (error) {
          reject(new TransportError(`Socket write failed: ${error.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  async read(): Promise<Uint8Array | null> {
    const chunk = this.inbox.shift();
    if (chunk) {
      return chunk;
    }
    if (this.failure) {
      throw this.failure;
    }
    if (this.ended) {
      return null;
    }
    return new Promise((resolve, reject) => this.waiters.push({ resolve, reject }));
  }

  async close(): Promise<void> {
    if (this.socket.destroyed) {
      this.finish();
      return;
    }
    await new Promise<void>(resolve => {
      this.socket.end(() => resolve());
    });
    this.socket.destroy();
    this.finish();
  }

  private finish(): void {
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve(null);
    }
  }
}

/**
 * Open a TCP connection
 */
export async function connectTcp(options: TransportOptions): Promise<SocketTransport> {
  const host = options.host ?? DEFAULT_HOST;
  const timeout = options.timeout ?? DEFAULT_CONNECT_TIMEOUT;

  return new Promise((resolve, reject) => {
    const socket = netConnect({ host, port: options.port });
    const timer = setTimeout(() => {
      socket.destroy();
      reject(new TransportError(`Connection to ${host}:${options.port} timed out`, { host, port: options.port, timeout }));
    }, timeout);

    socket.once('connect', () => {
      clearTimeout(timer);
      resolve(new SocketTransport(socket));
    });
    socket.once('error', error => {
      clearTimeout(timer);
      reject(new TransportError(`Failed to connect to ${host}:${options.port}: ${error.message}`, { host, port: options.port }));
    });
  });
}

export interface TcpListener {
  readonly port: number;
  /** Resolves with the next accepted connection */
  accept(): Promise<SocketTransport>;
  close(): Promise<void>;
}

/**
 * Listen for TCP connections on the given port (0 picks a free one)
 */
export async function listenTcp(options: TransportOptions): Promise<TcpListener> {
  const host = options.host ?? DEFAULT_HOST;
  const pending: Socket[] = [];
  const acceptors: Array<(socket: Socket) => void> = [];

  const server: Server = createServer(socket => {
    const acceptor = acceptors.shift();
    if (acceptor) {
      acceptor(socket);
    } else {
      pending.push(socket);
    }
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', error => {
      reject(new TransportError(`Failed to listen on ${host}:${options.port}: ${error.message}`, { host, port: options.port }));
    });
    server.listen(options.port, host, () => resolve());
  });

  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : options.port;

  return {
    port,
    accept: async () => {
      const socket = pending.shift();
      if (socket) {
        return new SocketTransport(socket);
      }
      return new Promise(resolve => acceptors.push(s => resolve(new SocketTransport(s))));
    },
    // Stops accepting; connections already handed out stay open, so the
    // server.close callback (which waits for them) is not awaited.
    close: async () => {
      for (const socket of pending.splice(0)) {
        socket.destroy();
      }
      if (server.listening) {
        server.close();
      }
    },
  };
}
