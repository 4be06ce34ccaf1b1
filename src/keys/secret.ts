/**
 * Erase-on-release container for key bytes
 *
 * The container owns its buffer. Callers borrow the bytes through use();
 * after erase() the buffer is all zeros and every access throws.
 */

import { KeyUnavailableError } from '../error.js';
import { constantTimeEquals } from '../crypto/utils.js';

export class SecretKey {
  private readonly bytes: Uint8Array;
  private erased = false;

  /**
   * Takes ownership of `bytes`. Pass a copy when the caller keeps its own buffer.
   */
  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  static copyOf(bytes: Uint8Array): SecretKey {
    return new SecretKey(Uint8Array.from(bytes));
  }

  get length(): number {
    return this.bytes.length;
  }

  get isErased(): boolean {
    return this.erased;
  }

  /**
   * Borrow the key bytes for the duration of fn. The reference must not escape.
   */
  use<T>(fn: (bytes: Uint8Array) => T): T {
    if (this.erased) {
      throw new KeyUnavailableError('Key material has been erased');
    }
    return fn(this.bytes);
  }

  equals(other: SecretKey): boolean {
    return this.use(a => other.use(b => constantTimeEquals(a, b)));
  }

  /**
   * Overwrite the backing storage with zeros. Idempotent.
   */
  erase(): void {
    this.bytes.fill(0);
    this.erased = true;
  }

  /**
   * True when the backing storage holds only zeros
   */
  isZeroed(): boolean {
    return this.bytes.every(b => b === 0);
  }
}

/**
 * Run fn with a scoped secret and erase it afterwards, whatever the outcome
 */
export async function withSecret<T>(secret: SecretKey, fn: (secret: SecretKey) => Promise<T>): Promise<T> {
  try {
    return await fn(secret);
  } finally {
    secret.erase();
  }
}
