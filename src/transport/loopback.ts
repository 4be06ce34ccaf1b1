/**
 * In-memory transport pair
 * Bytes written on one end are read, in order, on the other.
 */

import { TransportError } from '../error.js';
import type { Transport } from './types.js';

type Waiter = (chunk: Uint8Array | null) => void;

class LoopbackEnd implements Transport {
  peer: LoopbackEnd | null = null;
  private readonly inbox: Uint8Array[] = [];
  private readonly waiters: Waiter[] = [];
  private closed = false;
  private ended = false;

  async write(data: Uint8Array): Promise<void> {
    if (this.closed) {
      throw new TransportError('Transport is closed');
    }
    if (!this.peer || this.peer.closed) {
      throw new TransportError('Peer has closed the connection');
    }
    this.peer.deliver(Uint8Array.from(data));
  }

  async read(): Promise<Uint8Array | null> {
    const chunk = this.inbox.shift();
    if (chunk) {
      return chunk;
    }
    if (this.ended || this.closed) {
      return null;
    }
    return new Promise(resolve => this.waiters.push(resolve));
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.end();
    this.peer?.end();
  }

  private deliver(chunk: Uint8Array): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(chunk);
    } else {
      this.inbox.push(chunk);
    }
  }

  private end(): void {
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
  }
}

/**
 * Two connected in-memory endpoints
 */
export function createLoopbackPair(): [Transport, Transport] {
  const a = new LoopbackEnd();
  const b = new LoopbackEnd();
  a.peer = b;
  b.peer = a;
  return [a, b];
}
