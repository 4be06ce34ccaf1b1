import { describe, it, expect } from 'vitest';
import {
  CONFIRMATION_TAG_BYTES,
  PERMUTATION_SEED_BYTES,
  ParityCorrector,
  ParityOracle,
  RECONCILIATION_PASSES,
  blockCount,
  confirmationTag,
  firstBlockSize,
  layoutPass,
  nextBlockSize,
} from '../../src/quantum/reconcile.js';
import type { RandomSource } from '../../src/quantum/random.js';
import type { Bit } from '../../src/quantum/types.js';
import { bytesToHex, stringToBytes } from '../../src/crypto/utils.js';
import { InvalidParameterError } from '../../src/error.js';
import { seededRandom } from '../helpers/random.js';

const seed = new Uint8Array(PERMUTATION_SEED_BYTES).fill(7);

function randomBits(length: number, random: RandomSource): Bit[] {
  return Array.from(random(length), (byte): Bit => (byte & 1 ? 1 : 0));
}

function withErrors(bits: readonly Bit[], positions: readonly number[]): Bit[] {
  const noisy = [...bits];
  for (const position of positions) {
    noisy[position] = noisy[position] === 1 ? 0 : 1;
  }
  return noisy;
}

function distance(a: readonly Bit[], b: readonly Bit[]): number {
  return a.reduce<number>((count, bit, i) => count + (bit === b[i] ? 0 : 1), 0);
}

/** Runs every pass between the two parties in process */
function reconcile(reference: readonly Bit[], noisy: readonly Bit[], errorRate: number, random: RandomSource) {
  const oracle = new ParityOracle(reference);
  const corrector = new ParityCorrector(noisy);
  let blockSize = firstBlockSize(errorRate, reference.length);

  for (let pass = 0; pass < RECONCILIATION_PASSES; pass++) {
    const passSeed = random(PERMUTATION_SEED_BYTES);
    corrector.openPass(passSeed, blockSize, oracle.openPass(passSeed, blockSize));
    for (let ranges = corrector.requests(); ranges.length > 0; ranges = corrector.requests()) {
      corrector.resolve(oracle.answer(ranges));
    }
    blockSize = nextBlockSize(blockSize, reference.length);
  }
  return { oracle, corrector };
}

describe('Reconciliation', () => {
  describe('block sizes', () => {
    it('sizes the first block from the estimated error rate', () => {
      expect(firstBlockSize(0.05, 400)).toBe(15);
      expect(firstBlockSize(0.5, 400)).toBe(4);
      expect(firstBlockSize(0, 1000)).toBe(firstBlockSize(0.01, 1000));
      expect(firstBlockSize(0.05, 10)).toBe(10);
    });

    it('doubles up to the key length', () => {
      expect(nextBlockSize(15, 400)).toBe(30);
      expect(nextBlockSize(300, 400)).toBe(400);
    });
  });

  describe('layoutPass', () => {
    it('expands a seed into the same permutation on both sides', () => {
      const layout = layoutPass(seed, 64, 8);
      expect(layoutPass(seed, 64, 8).permutation).toEqual(layout.permutation);
      expect([...layout.permutation].sort((a, b) => a - b)).toEqual(Array.from({ length: 64 }, (_, i) => i));
      layout.permutation.forEach((index, position) => {
        expect(layout.positions[index]).toBe(position);
      });
    });

    it('shuffles differently under another seed', () => {
      const other = new Uint8Array(PERMUTATION_SEED_BYTES).fill(8);
      expect(layoutPass(other, 64, 8).permutation).not.toEqual(layoutPass(seed, 64, 8).permutation);
    });

    it('counts a short last block', () => {
      expect(blockCount(layoutPass(seed, 20, 8))).toBe(3);
    });

    it('rejects a block size outside the key and a short seed', () => {
      expect(() => layoutPass(seed, 64, 0)).toThrow(InvalidParameterError);
      expect(() => layoutPass(seed, 64, 65)).toThrow('Block size out of range');
      expect(() => layoutPass(new Uint8Array(4), 64, 8)).toThrow('Permutation seed too short');
    });
  });

  describe('between two parties', () => {
    it('discloses only block parities when the keys already agree', () => {
      const reference = randomBits(200, seededRandom('agree'));
      const { oracle, corrector } = reconcile(reference, reference, 0, seededRandom('agree passes'));

      // block sizes 73, 146, 200, 200 give 3 + 2 + 1 + 1 blocks
      expect(oracle.disclosedParities).toBe(7);
      expect(corrector.disclosedParities).toBe(7);
      expect(corrector.correctedBits).toBe(0);
      expect(corrector.passes).toBe(RECONCILIATION_PASSES);

      const key = oracle.finalBits();
      expect(key).toHaveLength(200 - 7 - CONFIRMATION_TAG_BYTES * 8);
      expect(corrector.finalBits()).toEqual(key);
    });

    it('finds and flips a single differing bit', () => {
      const reference = randomBits(256, seededRandom('single'));
      const { oracle, corrector } = reconcile(reference, withErrors(reference, [37]), 0.02, seededRandom('single passes'));

      expect(corrector.reconciledBits).toEqual(reference);
      expect(corrector.correctedBits).toBe(1);
      expect(corrector.disclosedParities).toBe(oracle.disclosedParities);
      expect(corrector.finalBits()).toEqual(oracle.finalBits());
    });

    it('only ever flips bits that really differ', () => {
      const random = seededRandom('noisy');
      const reference = randomBits(1000, random);
      const positions = Array.from(new Set(Array.from(random(50), (byte, i) => (byte * 4 + i * 17) % 1000)));
      const noisy = withErrors(reference, positions);

      const { oracle, corrector } = reconcile(reference, noisy, positions.length / 1000, seededRandom('noisy passes'));
      const remaining = distance(corrector.reconciledBits, reference);

      expect(corrector.correctedBits).toBeGreaterThan(0);
      expect(remaining).toBe(positions.length - corrector.correctedBits);
      expect(corrector.disclosedParities).toBe(oracle.disclosedParities);

      const context = stringToBytes('handshake');
      const tagsMatch = bytesToHex(confirmationTag(corrector.reconciledBits, context)) ===
        bytesToHex(confirmationTag(oracle.reconciledBits, context));
      expect(tagsMatch).toBe(remaining === 0);
    });

    it('leaves the caller\'s bits untouched', () => {
      const reference = randomBits(128, seededRandom('copy'));
      const noisy = withErrors(reference, [5]);
      const before = [...noisy];
      reconcile(reference, noisy, 0.02, seededRandom('copy passes'));
      expect(noisy).toEqual(before);
    });
  });

  describe('malformed exchanges', () => {
    const reference = randomBits(64, seededRandom('malformed'));

    it('refuses parity requests that are not whole ranges', () => {
      const oracle = new ParityOracle(reference);
      oracle.openPass(seed, 8);
      expect(() => oracle.answer([0, 0])).toThrow('Parity request is not a list of ranges');
    });

    it('refuses ranges outside a known pass', () => {
      const oracle = new ParityOracle(reference);
      oracle.openPass(seed, 8);
      expect(() => oracle.answer([1, 0, 4])).toThrow('Parity request out of range');
      expect(() => oracle.answer([0, 4, 4])).toThrow('Parity request out of range');
      expect(() => oracle.answer([0, 60, 65])).toThrow('Parity request out of range');
      expect(oracle.answer([0, 0, 64])).toHaveLength(1);
    });

    it('refuses a parity list of the wrong length', () => {
      const corrector = new ParityCorrector(reference);
      expect(() => corrector.openPass(seed, 8, [0, 1])).toThrow('Block parity count does not match the pass layout');
      expect(() => new ParityCorrector(reference).resolve([1])).toThrow('Parity count does not match the request');
    });
  });

  describe('confirmationTag', () => {
    const bits = randomBits(100, seededRandom('tag'));
    const context = stringToBytes('transcript');

    it('is short and depends on every bit and the context', () => {
      const tag = confirmationTag(bits, context);
      expect(tag).toHaveLength(CONFIRMATION_TAG_BYTES);
      expect(confirmationTag(bits, context)).toEqual(tag);
      expect(confirmationTag(withErrors(bits, [99]), context)).not.toEqual(tag);
      expect(confirmationTag(bits, stringToBytes('other transcript'))).not.toEqual(tag);
    });
  });
});
