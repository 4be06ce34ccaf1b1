/**
 * Quantum bit error rate estimation
 *
 * Both endpoints disclose their bits at an agreed random subset of sifted
 * positions. Disclosed positions are removed from the key afterwards.
 */

import { InvalidParameterError } from '../error.js';
import { assertValid, validateRate } from '../validation.js';
import { Bit, QberReport, SiftedKey } from './types.js';
import { RandomSource, defaultRandom, randomInt } from './random.js';

/** BB84 security bound */
export const DEFAULT_QBER_THRESHOLD = 0.11;

/**
 * Choose max(1, ceil(length * fraction)) distinct sifted positions, sorted
 */
export function chooseSampleIndices(
  siftedLength: number,
  fraction: number,
  random: RandomSource = defaultRandom,
): number[] {
  assertValid(validateRate('sampleFraction', fraction), 'Invalid sample fraction');
  if (!Number.isInteger(siftedLength) || siftedLength <= 0) {
    throw new InvalidParameterError('Cannot sample an empty sifted key', [], { siftedLength });
  }

  const size = Math.min(siftedLength, Math.max(1, Math.ceil(siftedLength * fraction)));

  // Partial Fisher-Yates over the index range
  const pool = Array.from({ length: siftedLength }, (_, i) => i);
  for (let i = 0; i < size; i++) {
    const j = i + randomInt(siftedLength - i, random);
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }

  return pool.slice(0, size).sort((a, b) => a - b);
}

function validateSampleIndices(sampleIndices: readonly number[], siftedLength: number): void {
  if (sampleIndices.length === 0) {
    throw new InvalidParameterError('QBER sample must contain at least one disclosed bit', [], {
      sampleSize: 0,
    });
  }

  const seen = new Set<number>();
  for (const index of sampleIndices) {
    if (!Number.isInteger(index) || index < 0 || index >= siftedLength) {
      throw new InvalidParameterError('Sample index out of range', [], { index, siftedLength });
    }
    if (seen.has(index)) {
      throw new InvalidParameterError('Duplicate sample index', [], { index });
    }
    seen.add(index);
  }
}

/**
 * Compare local sifted bits against the peer's disclosed sample
 */
export function estimate(
  siftedLocal: SiftedKey,
  peerSampleBits: readonly Bit[],
  sampleIndices: readonly number[],
  threshold: number = DEFAULT_QBER_THRESHOLD,
): QberReport {
  assertValid(validateRate('qberThreshold', threshold), 'Invalid QBER threshold');
  validateSampleIndices(sampleIndices, siftedLocal.bits.length);
  if (peerSampleBits.length !== sampleIndices.length) {
    throw new InvalidParameterError('Sample bits and indices differ in length', [], {
      bits: peerSampleBits.length,
      indices: sampleIndices.length,
    });
  }

  let mismatches = 0;
  sampleIndices.forEach((index, i) => {
    if (siftedLocal.bits[index] !== peerSampleBits[i]) {
      mismatches++;
    }
  });

  const sampleSize = sampleIndices.length;
  const errorRate = mismatches / sampleSize;

  const report: QberReport = {
    sampleSize,
    mismatches,
    errorRate,
    decision: errorRate <= threshold ? 'accept' : 'abort',
  };
  return Object.freeze(report);
}

/**
 * Bits this endpoint discloses at the sample positions
 */
export function sampleBits(sifted: SiftedKey, sampleIndices: readonly number[]): Bit[] {
  validateSampleIndices(sampleIndices, sifted.bits.length);
  return sampleIndices.map(index => sifted.bits[index]);
}

/**
 * Remove disclosed positions; the remainder is the usable quantum key
 */
export function discardSample(sifted: SiftedKey, sampleIndices: readonly number[]): SiftedKey {
  const disclosed = new Set(sampleIndices);
  const bits: Bit[] = [];
  const positions: number[] = [];
  sifted.bits.forEach((bit, i) => {
    if (!disclosed.has(i)) {
      bits.push(bit);
      positions.push(sifted.positions[i]);
    }
  });

  return Object.freeze({
    bits: Object.freeze(bits),
    positions: Object.freeze(positions),
  });
}
