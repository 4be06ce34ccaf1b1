/**
 * Session key lifetime: activation, rotation policy and erasure
 *
 * Readers take a short-lived lease on a generation; erasing a leased
 * generation is deferred until the last lease is released. Activation only
 * swaps the current generation, so in-flight leases on the previous key stay
 * valid until they drain.
 */

import { KeyUnavailableError, InvalidParameterError } from '../error.js';
import { SecretKey } from './secret.js';

export interface HybridSessionKey {
  readonly material: SecretKey;
  readonly generation: number;
  readonly createdAt: number;
}

export interface RotationPolicy {
  rotationIntervalMs: number;
  rotationByteLimit: number;
}

export interface KeyLease {
  readonly key: HybridSessionKey;
  release(): void;
}

type GenerationStatus = 'active' | 'retired';

interface GenerationEntry {
  key: HybridSessionKey;
  status: GenerationStatus;
  leases: number;
  pendingErase: boolean;
  bytesEncrypted: number;
}

export type Clock = () => number;

export class SessionKeyManager {
  private readonly generations = new Map<number, GenerationEntry>();
  private currentGeneration = 0;

  constructor(
    private readonly policy: RotationPolicy,
    private readonly clock: Clock = Date.now,
  ) {}

  /**
   * Install new key material as generation N+1 and retire generation N.
   * The retired key stays usable for draining until erase() is called.
   */
  activate(material: SecretKey, now: number = this.clock()): HybridSessionKey {
    if (material.isErased) {
      throw new InvalidParameterError('Cannot activate erased key material');
    }

    const previous = this.generations.get(this.currentGeneration);
    if (previous) {
      previous.status = 'retired';
    }

    const generation = this.currentGeneration + 1;
    const key: HybridSessionKey = Object.freeze({ material, generation, createdAt: now });
    this.generations.set(generation, {
      key,
      status: 'active',
      leases: 0,
      pendingErase: false,
      bytesEncrypted: 0,
    });
    this.currentGeneration = generation;

    return key;
  }

  /**
   * Current generation number, 0 before the first activation
   */
  get generation(): number {
    return this.currentGeneration;
  }

  hasActiveKey(): boolean {
    return this.generations.get(this.currentGeneration)?.status === 'active';
  }

  isAvailable(generation: number): boolean {
    const entry = this.generations.get(generation);
    return entry !== undefined && !entry.pendingErase;
  }

  /**
   * Take a shared lease on a generation (the current one by default)
   */
  acquire(generation: number = this.currentGeneration): KeyLease {
    const entry = this.generations.get(generation);
    if (!entry || entry.pendingErase) {
      throw new KeyUnavailableError('Key generation is not available', {
        generation,
        current: this.currentGeneration,
      });
    }

    entry.leases++;
    let released = false;
    return {
      key: entry.key,
      release: () => {
        if (released) return;
        released = true;
        entry.leases--;
        if (entry.pendingErase && entry.leases === 0) {
          this.destroy(generation, entry);
        }
      },
    };
  }

  /**
   * Rotation trigger: elapsed time over the interval OR bytes over the volume limit
   */
  rotateDue(elapsedMs: number, bytesEncrypted: number): boolean {
    return elapsedMs > this.policy.rotationIntervalMs || bytesEncrypted > this.policy.rotationByteLimit;
  }

  /**
   * rotateDue() evaluated against the current key's age and volume
   */
  isRotationDue(now: number = this.clock()): boolean {
    const entry = this.generations.get(this.currentGeneration);
    if (!entry || entry.status !== 'active') {
      return false;
    }
    return this.rotateDue(now - entry.key.createdAt, entry.bytesEncrypted);
  }

  recordEncrypted(bytes: number, generation: number = this.currentGeneration): void {
    const entry = this.generations.get(generation);
    if (entry) {
      entry.bytesEncrypted += bytes;
    }
  }

  bytesEncrypted(generation: number = this.currentGeneration): number {
    return this.generations.get(generation)?.bytesEncrypted ?? 0;
  }

  retiredGenerations(): number[] {
    return [...this.generations.entries()]
      .filter(([, entry]) => entry.status === 'retired' && !entry.pendingErase)
      .map(([generation]) => generation);
  }

  liveGenerations(): number[] {
    return [...this.generations.keys()];
  }

  /**
   * Zero the generation's key and make it unusable.
   * Returns false when erasure is deferred until outstanding leases drain.
   */
  erase(generation: number): boolean {
    const entry = this.generations.get(generation);
    if (!entry) {
      return true;
    }

    entry.pendingErase = true;
    if (entry.leases > 0) {
      return false;
    }
    this.destroy(generation, entry);
    return true;
  }

  /**
   * Teardown: erase every generation still held
   */
  eraseAll(): void {
    for (const generation of [...this.generations.keys()]) {
      this.erase(generation);
    }
  }

  private destroy(generation: number, entry: GenerationEntry): void {
    entry.key.material.erase();
    this.generations.delete(generation);
  }
}
