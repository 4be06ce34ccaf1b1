import { describe, it, expect } from 'vitest';
import { derive, deriveSessionId, MIN_CLASSICAL_ENTROPY_BYTES } from '../../src/keys/derive.js';
import { InsufficientEntropyError, InvalidParameterError } from '../../src/error.js';
import type { Bit } from '../../src/quantum/types.js';

const quantumBits: Bit[] = [1, 0, 1, 1, 0, 1, 0, 0, 1, 1, 1, 0];
const classical = new Uint8Array(32).fill(0x11);
const authenticated = new Uint8Array(32).fill(0x22);

function keyBytes(bits: readonly Bit[], classicalEntropy: Uint8Array, secret: Uint8Array): Uint8Array {
  return derive(bits, classicalEntropy, secret).use(bytes => Uint8Array.from(bytes));
}

function differingBits(a: Uint8Array, b: Uint8Array): number {
  let count = 0;
  for (let i = 0; i < a.length; i++) {
    let x = a[i] ^ b[i];
    while (x) {
      count += x & 1;
      x >>= 1;
    }
  }
  return count;
}

describe('HybridKeyDeriver', () => {
  it('produces a 256-bit key', () => {
    expect(derive(quantumBits, classical, authenticated).length).toBe(32);
  });

  it('is deterministic', () => {
    expect(keyBytes(quantumBits, classical, authenticated)).toEqual(keyBytes(quantumBits, classical, authenticated));
  });

  it('changes about half the output bits when one quantum bit flips', () => {
    const flipped: Bit[] = [...quantumBits];
    flipped[5] = flipped[5] === 1 ? 0 : 1;

    const distance = differingBits(
      keyBytes(quantumBits, classical, authenticated),
      keyBytes(flipped, classical, authenticated),
    );
    expect(distance).toBeGreaterThan(80);
    expect(distance).toBeLessThan(176);
  });

  it('depends on every input', () => {
    const base = keyBytes(quantumBits, classical, authenticated);
    const otherClassical = Uint8Array.from(classical);
    otherClassical[31] ^= 1;
    const otherSecret = Uint8Array.from(authenticated);
    otherSecret[0] ^= 0x80;

    expect(keyBytes(quantumBits, otherClassical, authenticated)).not.toEqual(base);
    expect(keyBytes(quantumBits, classical, otherSecret)).not.toEqual(base);
  });

  it('binds inputs to their position in the concatenation', () => {
    const a = new Uint8Array(32).fill(0x33);
    const b = new Uint8Array(32).fill(0x44);
    expect(keyBytes(quantumBits, a, b)).not.toEqual(keyBytes(quantumBits, b, a));
  });

  it('distinguishes quantum keys that pack to the same bytes', () => {
    // [1] and [1, 0] both pack to 0x80
    expect(keyBytes([1], classical, authenticated)).not.toEqual(keyBytes([1, 0], classical, authenticated));
  });

  it('accepts an empty authenticated secret', () => {
    expect(derive(quantumBits, classical, new Uint8Array(0)).length).toBe(32);
  });

  it('fails with InsufficientEntropy when the quantum key is empty', () => {
    expect(() => derive([], classical, authenticated)).toThrow(InsufficientEntropyError);
  });

  it('fails with InsufficientEntropy below 128 bits of classical entropy', () => {
    expect(MIN_CLASSICAL_ENTROPY_BYTES).toBe(16);
    expect(() => derive(quantumBits, new Uint8Array(15), authenticated)).toThrow(InsufficientEntropyError);
    expect(() => derive(quantumBits, new Uint8Array(16), authenticated)).not.toThrow();
  });

  it('rejects key lengths other than 256 bits', () => {
    expect(() => derive(quantumBits, classical, authenticated, 128)).toThrow(InvalidParameterError);
  });

  it('leaves caller buffers untouched', () => {
    const secret = new Uint8Array(32).fill(0x55);
    derive(quantumBits, classical, secret);
    expect(secret.every(byte => byte === 0x55)).toBe(true);
  });

  describe('deriveSessionId', () => {
    it('is a stable 32-byte identifier that depends on the nonces', () => {
      const key = derive(quantumBits, classical, authenticated);
      const nonceA = new Uint8Array(16).fill(1);
      const nonceB = new Uint8Array(16).fill(2);

      const id = deriveSessionId(key, nonceA, nonceB);
      expect(id).toHaveLength(32);
      expect(deriveSessionId(key, nonceA, nonceB)).toEqual(id);
      expect(deriveSessionId(key, nonceB, nonceA)).not.toEqual(id);
    });
  });
});
