/**
 * Basis reconciliation
 * Keeps the bits measured where both endpoints chose the same basis
 */

import { InsufficientKeyMaterialError, LengthMismatchError } from '../error.js';
import { Basis, Bit, SiftedKey } from './types.js';

export function sift(
  localBases: readonly Basis[],
  peerBases: readonly Basis[],
  localBits: readonly Bit[],
): SiftedKey {
  if (localBases.length !== peerBases.length || localBases.length !== localBits.length) {
    throw new LengthMismatchError('Basis sequences must have equal length', {
      localBases: localBases.length,
      peerBases: peerBases.length,
      localBits: localBits.length,
    });
  }

  const bits: Bit[] = [];
  const positions: number[] = [];
  for (let i = 0; i < localBases.length; i++) {
    if (localBases[i] === peerBases[i]) {
      bits.push(localBits[i]);
      positions.push(i);
    }
  }

  return Object.freeze({
    bits: Object.freeze(bits),
    positions: Object.freeze(positions),
  });
}

/**
 * Callers must request a fresh stream when this throws
 */
export function assertSufficient(sifted: SiftedKey, minLength: number): void {
  if (sifted.bits.length < minLength) {
    throw new InsufficientKeyMaterialError('Sifted key shorter than required minimum', {
      length: sifted.bits.length,
      minLength,
    });
  }
}
