/**
 * Quantum channel simulator
 *
 * Prepares random BB84 bit/basis streams and simulates the receiving party's
 * measurement. When the receiver's basis matches the sender's, the bit passes
 * through and is flipped with the channel error rate; a mismatched basis
 * disturbs the state and the outcome is uniformly random. Those positions are
 * discarded by sifting anyway.
 */

import { InvalidParameterError } from '../error.js';
import { assertValid, combine, validatePositiveInteger, validateRate } from '../validation.js';
import { Basis, Bit, BitBasisStream } from './types.js';
import { RandomSource, defaultRandom, randomUnit } from './random.js';

function freezeStream(bits: Bit[], bases: Basis[], errorRate: number): BitBasisStream {
  return Object.freeze({
    bits: Object.freeze(bits),
    bases: Object.freeze(bases),
    errorRate,
  });
}

function toBit(value: number): Bit {
  return value & 1 ? 1 : 0;
}

function toBasis(value: number): Basis {
  return value & 1 ? Basis.Diagonal : Basis.Rectilinear;
}

export class QuantumChannelSimulator {
  constructor(private readonly random: RandomSource = defaultRandom) {}

  /**
   * Prepare n independent uniformly random (bit, basis) pairs
   */
  generate(n: number, errorRate = 0): BitBasisStream {
    assertValid(
      combine(validatePositiveInteger('n', n), validateRate('errorRate', errorRate)),
      'Invalid stream parameters',
    );

    const entropy = this.random(n);
    const bits: Bit[] = new Array(n);
    const bases: Basis[] = new Array(n);
    for (let i = 0; i < n; i++) {
      bits[i] = toBit(entropy[i]);
      bases[i] = toBasis(entropy[i] >> 1);
    }
    entropy.fill(0);

    return freezeStream(bits, bases, errorRate);
  }

  /**
   * Measure a transmitted stream with freshly chosen receiver bases
   */
  transmit(stream: BitBasisStream, channelErrorRate: number = stream.errorRate): BitBasisStream {
    assertValid(validateRate('channelErrorRate', channelErrorRate), 'Invalid channel parameters');
    if (stream.bits.length !== stream.bases.length) {
      throw new InvalidParameterError('Stream bits and bases differ in length', [], {
        bits: stream.bits.length,
        bases: stream.bases.length,
      });
    }

    const n = stream.bits.length;
    const choices = this.random(n);
    const bits: Bit[] = new Array(n);
    const bases: Basis[] = new Array(n);

    for (let i = 0; i < n; i++) {
      const basis = toBasis(choices[i]);
      bases[i] = basis;
      if (basis === stream.bases[i]) {
        const flip = channelErrorRate > 0 && randomUnit(this.random) < channelErrorRate;
        bits[i] = flip ? toBit(stream.bits[i] ^ 1) : stream.bits[i];
      } else {
        bits[i] = toBit(choices[i] >> 1);
      }
    }
    choices.fill(0);

    return freezeStream(bits, bases, channelErrorRate);
  }
}

/**
 * Pack a stream into 2-bit symbols: bit in the low bit, basis in the high bit
 */
export function streamToSymbols(stream: BitBasisStream): number[] {
  return stream.bits.map((bit, i) => bit | (stream.bases[i] << 1));
}

export function symbolsToStream(symbols: readonly number[], errorRate: number): BitBasisStream {
  const bits: Bit[] = [];
  const bases: Basis[] = [];
  for (const symbol of symbols) {
    if (!Number.isInteger(symbol) || symbol < 0 || symbol > 3) {
      throw new InvalidParameterError('Invalid quantum state symbol', [], { symbol });
    }
    bits.push(toBit(symbol));
    bases.push(toBasis(symbol >> 1));
  }
  return freezeStream(bits, bases, errorRate);
}
