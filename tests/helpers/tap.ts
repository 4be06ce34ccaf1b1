import { createLoopbackPair } from '../../src/transport/loopback.js';
import type { Transport } from '../../src/transport/types.js';
import { MessageType } from '../../src/wire.js';

/**
 * Records every framed message written through it. A rewrite hook can alter
 * or drop writes, and inject() puts raw bytes on the wire toward the peer.
 */
export class TappedTransport implements Transport {
  readonly written: Uint8Array[] = [];
  rewrite: ((chunk: Uint8Array) => Uint8Array | null) | null = null;

  constructor(private readonly inner: Transport) {}

  async write(data: Uint8Array): Promise<void> {
    const chunk = Uint8Array.from(data);
    this.written.push(chunk);
    const out = this.rewrite ? this.rewrite(chunk) : chunk;
    if (out) {
      await this.inner.write(out);
    }
  }

  read(): Promise<Uint8Array | null> {
    return this.inner.read();
  }

  close(): Promise<void> {
    return this.inner.close();
  }

  async inject(data: Uint8Array): Promise<void> {
    await this.inner.write(data);
  }

  /** Written chunks carrying an encrypted application frame */
  frames(): Uint8Array[] {
    return this.written.filter(isFrameChunk);
  }
}

/** Each write is one length-prefixed message; the type byte follows the 4-byte length */
export function isFrameChunk(chunk: Uint8Array): boolean {
  return chunk[4] === MessageType.AeadFrame;
}

export function createTappedPair(): [TappedTransport, TappedTransport] {
  const [a, b] = createLoopbackPair();
  return [new TappedTransport(a), new TappedTransport(b)];
}
