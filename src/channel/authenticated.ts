/**
 * Stateful frame channel over the session key manager
 *
 * Outbound sequence numbers start at 0 for every generation and only grow.
 * Inbound frames must carry a sequence above the last accepted one for their
 * generation: a repeat or regression is a replay, a jump means lost frames.
 * Each endpoint seals in its own direction and opens only the peer's, so a
 * frame reflected back to its sender fails authentication.
 */

import { ReplayDetectedError } from '../error.js';
import type { SessionKeyManager } from '../keys/manager.js';
import { AeadFrame, Direction, open, oppositeDirection, seal } from './aead.js';

export interface OpenedFrame {
  plaintext: Uint8Array;
  generation: number;
  sequence: bigint;
  /** Frames skipped between the previous accepted sequence and this one */
  lostFrames: bigint;
}

export class AuthenticatedChannel {
  private readonly nextOutbound = new Map<number, bigint>();
  private readonly lastInbound = new Map<number, bigint>();

  private readonly inbound: Direction;

  constructor(
    private readonly keys: SessionKeyManager,
    private readonly outbound: Direction,
  ) {
    this.inbound = oppositeDirection(outbound);
  }

  /**
   * Seal under the current generation with its next sequence number
   */
  sealNext(plaintext: Uint8Array, associatedData?: Uint8Array): AeadFrame {
    const lease = this.keys.acquire();
    try {
      const { generation, material } = lease.key;
      const sequence = this.nextOutbound.get(generation) ?? 0n;
      const frame = seal(material, this.outbound, generation, sequence, plaintext, associatedData);
      this.nextOutbound.set(generation, sequence + 1n);
      this.keys.recordEncrypted(plaintext.length, generation);
      return frame;
    } finally {
      lease.release();
    }
  }

  openFrame(frame: AeadFrame): OpenedFrame {
    const last = this.lastInbound.get(frame.generation);
    if (last !== undefined && frame.sequence <= last) {
      throw new ReplayDetectedError('Frame sequence already seen', {
        generation: frame.generation,
        sequence: frame.sequence,
        lastAccepted: last,
      });
    }

    const lease = this.keys.acquire(frame.generation);
    try {
      const plaintext = open(lease.key.material, this.inbound, frame);
      const expected = last === undefined ? 0n : last + 1n;
      this.lastInbound.set(frame.generation, frame.sequence);
      return {
        plaintext,
        generation: frame.generation,
        sequence: frame.sequence,
        lostFrames: frame.sequence - expected,
      };
    } finally {
      lease.release();
    }
  }

  /**
   * Highest inbound sequence accepted for a generation
   */
  lastAccepted(generation: number): bigint | undefined {
    return this.lastInbound.get(generation);
  }

  /**
   * Drop counters for an erased generation
   */
  forget(generation: number): void {
    this.nextOutbound.delete(generation);
    this.lastInbound.delete(generation);
  }
}
