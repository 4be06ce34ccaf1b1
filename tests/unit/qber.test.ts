import { describe, it, expect } from 'vitest';
import {
  DEFAULT_QBER_THRESHOLD,
  chooseSampleIndices,
  discardSample,
  estimate,
  sampleBits,
} from '../../src/quantum/qber.js';
import type { SiftedKey } from '../../src/quantum/types.js';
import { InvalidParameterError } from '../../src/error.js';
import { seededRandom } from '../helpers/random.js';

const sifted: SiftedKey = {
  bits: [1, 0, 1, 1, 0, 0, 1, 0],
  positions: [0, 3, 4, 7, 9, 10, 12, 15],
};

describe('QBER estimation', () => {
  describe('estimate', () => {
    it('reports zero errors when the samples agree', () => {
      const report = estimate(sifted, [1, 1, 0, 1], [0, 2, 4, 6]);
      expect(report).toEqual({ sampleSize: 4, mismatches: 0, errorRate: 0, decision: 'accept' });
    });

    it('computes the error rate as mismatches over sample size', () => {
      const report = estimate(sifted, [0, 1, 1, 1], [0, 2, 4, 6]);
      expect(report.mismatches).toBe(2);
      expect(report.errorRate).toBe(0.5);
      expect(report.decision).toBe('abort');
    });

    it('accepts an error rate equal to the threshold', () => {
      const report = estimate(sifted, [0, 1, 0, 1], [0, 2, 4, 6], 0.25);
      expect(report.errorRate).toBe(0.25);
      expect(report.decision).toBe('accept');
    });

    it('aborts just above the default threshold', () => {
      // 1 mismatch in 8 = 0.125 > 0.11
      const report = estimate(sifted, [0, 0, 1, 1, 0, 0, 1, 0], [0, 1, 2, 3, 4, 5, 6, 7]);
      expect(DEFAULT_QBER_THRESHOLD).toBe(0.11);
      expect(report.errorRate).toBe(0.125);
      expect(report.decision).toBe('abort');
    });

    it('returns a frozen report', () => {
      expect(Object.isFrozen(estimate(sifted, [1], [0]))).toBe(true);
    });

    it('fails on an empty sample', () => {
      expect(() => estimate(sifted, [], [])).toThrow('QBER sample must contain at least one disclosed bit');
      expect(() => estimate(sifted, [], [])).toThrow(InvalidParameterError);
    });

    it('fails on out-of-range or duplicate indices', () => {
      expect(() => estimate(sifted, [1], [8])).toThrow('Sample index out of range');
      expect(() => estimate(sifted, [1], [-1])).toThrow('Sample index out of range');
      expect(() => estimate(sifted, [1, 1], [0, 0])).toThrow('Duplicate sample index');
    });

    it('fails when bits and indices differ in length', () => {
      expect(() => estimate(sifted, [1, 0], [0])).toThrow('Sample bits and indices differ in length');
    });

    it('rejects a threshold outside [0, 1]', () => {
      expect(() => estimate(sifted, [1], [0], 1.5)).toThrow(InvalidParameterError);
    });
  });

  describe('chooseSampleIndices', () => {
    it('chooses ceil(length * fraction) distinct sorted positions', () => {
      const indices = chooseSampleIndices(100, 0.2, seededRandom('sample'));

      expect(indices).toHaveLength(20);
      expect(new Set(indices).size).toBe(20);
      expect([...indices].sort((a, b) => a - b)).toEqual(indices);
      expect(indices.every(index => index >= 0 && index < 100)).toBe(true);
    });

    it('always samples at least one position', () => {
      expect(chooseSampleIndices(3, 0.01, seededRandom('tiny'))).toHaveLength(1);
    });

    it('samples every position at fraction 1', () => {
      expect(chooseSampleIndices(5, 1, seededRandom('all'))).toEqual([0, 1, 2, 3, 4]);
    });

    it('rejects an empty sifted key', () => {
      expect(() => chooseSampleIndices(0, 0.2)).toThrow(InvalidParameterError);
    });
  });

  describe('sampleBits', () => {
    it('returns the local bits at the sample positions', () => {
      expect(sampleBits(sifted, [1, 3, 6])).toEqual([0, 1, 1]);
    });
  });

  describe('discardSample', () => {
    it('removes disclosed positions from the usable key', () => {
      const remaining = discardSample(sifted, [0, 2, 4, 6]);
      expect(remaining.bits).toEqual([0, 1, 0, 0]);
      expect(remaining.positions).toEqual([3, 7, 10, 15]);
    });

    it('leaves no disclosed bit behind', () => {
      const indices = chooseSampleIndices(sifted.bits.length, 0.5, seededRandom('discard'));
      const remaining = discardSample(sifted, indices);
      const disclosedPositions = indices.map(index => sifted.positions[index]);

      expect(remaining.bits).toHaveLength(sifted.bits.length - indices.length);
      expect(remaining.positions.some(position => disclosedPositions.includes(position))).toBe(false);
    });
  });
});
