/**
 * Parity-based error reconciliation
 *
 * The initiator's bits are the reference. Every pass shuffles the key with a
 * permutation both sides expand from a seed the initiator picks, cuts it into
 * blocks and discloses the initiator's block parities. The responder
 * binary-searches each block whose parity differs from its own, asking for the
 * parity of the left half until one bit is left, and flips that bit. A flipped
 * bit also changes the parity of the blocks holding it in the other passes,
 * which reopens their search.
 *
 * One key bit is dropped for every disclosed parity, and the length of the
 * confirmation tag is dropped at the end.
 */

import { sha3_256 } from '@noble/hashes/sha3';
import { hkdf } from '@noble/hashes/hkdf';
import { InvalidParameterError } from '../error.js';
import { concat, packBits, stringToBytes, writeU32BE } from '../crypto/utils.js';
import { expandSeed, randomInt } from './random.js';
import type { Bit } from './types.js';

export const RECONCILIATION_PASSES = 4;
export const PERMUTATION_SEED_BYTES = 16;
export const CONFIRMATION_TAG_BYTES = 8;

const MIN_FIRST_BLOCK = 4;
/** First block holds about this many expected errors */
const FIRST_BLOCK_ERRORS = 0.73;
const MIN_ERROR_RATE = 0.01;
const CONFIRMATION_INFO = stringToBytes('qkd/v1/reconcile/confirm');

export interface PassLayout {
  /** Key index at each shuffled position */
  permutation: readonly number[];
  /** Shuffled position of each key index */
  positions: readonly number[];
  blockSize: number;
}

interface Disclosure {
  layout: PassLayout;
  start: number;
  end: number;
}

interface Search {
  pass: number;
  block: number;
  start: number;
  end: number;
  /** Reference parity of [start, end) */
  peerParity: Bit;
}

/**
 * Block size of the first pass for an estimated error rate. Later passes double it.
 */
export function firstBlockSize(errorRate: number, length: number): number {
  const size = Math.ceil(FIRST_BLOCK_ERRORS / Math.max(errorRate, MIN_ERROR_RATE));
  return Math.max(1, Math.min(length, Math.max(MIN_FIRST_BLOCK, size)));
}

export function nextBlockSize(blockSize: number, length: number): number {
  return Math.max(1, Math.min(length, blockSize * 2));
}

export function layoutPass(seed: Uint8Array, length: number, blockSize: number): PassLayout {
  if (!Number.isSafeInteger(blockSize) || blockSize < 1 || blockSize > Math.max(length, 1)) {
    throw new InvalidParameterError('Block size out of range', [], { blockSize, length });
  }
  if (seed.length < PERMUTATION_SEED_BYTES) {
    throw new InvalidParameterError('Permutation seed too short', [], { length: seed.length });
  }

  const random = expandSeed(seed);
  const permutation = Array.from({ length }, (_, i) => i);
  for (let i = length - 1; i > 0; i--) {
    const j = randomInt(i + 1, random);
    [permutation[i], permutation[j]] = [permutation[j], permutation[i]];
  }
  const positions = new Array<number>(length);
  permutation.forEach((index, position) => {
    positions[index] = position;
  });
  return { permutation, positions, blockSize };
}

export function blockCount(layout: PassLayout): number {
  return Math.ceil(layout.permutation.length / layout.blockSize);
}

function blockBounds(layout: PassLayout, block: number): [number, number] {
  const start = block * layout.blockSize;
  return [start, Math.min(start + layout.blockSize, layout.permutation.length)];
}

function midpoint(start: number, end: number): number {
  return start + Math.floor((end - start) / 2);
}

function xor(a: Bit, b: Bit): Bit {
  return a === b ? 0 : 1;
}

/**
 * Parity of the bits at shuffled positions [start, end)
 */
export function rangeParity(bits: readonly Bit[], layout: PassLayout, start: number, end: number): Bit {
  let parity: Bit = 0;
  for (let position = start; position < end; position++) {
    parity = xor(parity, bits[layout.permutation[position]]);
  }
  return parity;
}

/**
 * Check value over the reconciled bits, bound to the handshake so far
 */
export function confirmationTag(bits: readonly Bit[], context: Uint8Array): Uint8Array {
  return hkdf(sha3_256, concat(writeU32BE(bits.length), packBits(bits)), context, CONFIRMATION_INFO, CONFIRMATION_TAG_BYTES);
}

export abstract class ReconcilingParty {
  protected readonly layouts: PassLayout[] = [];
  protected readonly bits: Bit[];
  private readonly disclosures: Disclosure[] = [];

  constructor(bits: readonly Bit[]) {
    this.bits = [...bits];
  }

  get reconciledBits(): readonly Bit[] {
    return this.bits;
  }

  get disclosedParities(): number {
    return this.disclosures.length;
  }

  get passes(): number {
    return this.layouts.length;
  }

  /**
   * Key bits left once one bit of every disclosed range and the tag length are removed.
   * Both sides record the same disclosures in the same order, so they drop the same bits.
   */
  finalBits(): Bit[] {
    const dropped = new Set<number>();
    for (const { layout, start, end } of this.disclosures) {
      for (let position = start; position < end; position++) {
        const index = layout.permutation[position];
        if (!dropped.has(index)) {
          dropped.add(index);
          break;
        }
      }
    }
    const kept = this.bits.filter((_, index) => !dropped.has(index));
    return kept.slice(0, Math.max(0, kept.length - CONFIRMATION_TAG_BYTES * 8));
  }

  protected disclose(layout: PassLayout, start: number, end: number): void {
    this.disclosures.push({ layout, start, end });
  }

  protected addPass(seed: Uint8Array, blockSize: number): PassLayout {
    const layout = layoutPass(seed, this.bits.length, blockSize);
    this.layouts.push(layout);
    for (let block = 0; block < blockCount(layout); block++) {
      const [start, end] = blockBounds(layout, block);
      this.disclose(layout, start, end);
    }
    return layout;
  }
}

/**
 * Reference side: discloses parities on request
 */
export class ParityOracle extends ReconcilingParty {
  openPass(seed: Uint8Array, blockSize: number): Bit[] {
    const layout = this.addPass(seed, blockSize);
    return Array.from({ length: blockCount(layout) }, (_, block) => {
      const [start, end] = blockBounds(layout, block);
      return rangeParity(this.bits, layout, start, end);
    });
  }

  /**
   * Parities for flattened (pass, start, end) triples
   */
  answer(requests: readonly number[]): Bit[] {
    if (requests.length % 3 !== 0) {
      throw new InvalidParameterError('Parity request is not a list of ranges', [], { length: requests.length });
    }

    const parities: Bit[] = [];
    for (let i = 0; i < requests.length; i += 3) {
      const [pass, start, end] = requests.slice(i, i + 3);
      const layout = this.layouts.at(pass);
      if (!layout || start >= end || end > layout.permutation.length) {
        throw new InvalidParameterError('Parity request out of range', [], { pass, start, end });
      }
      this.disclose(layout, start, end);
      parities.push(rangeParity(this.bits, layout, start, end));
    }
    return parities;
  }
}

/**
 * Correcting side: locates and flips the bits that differ from the reference
 */
export class ParityCorrector extends ReconcilingParty {
  private readonly peerBlockParities: Bit[][] = [];
  private readonly searching = new Set<string>();
  private active: Search[] = [];
  private flips = 0;

  get correctedBits(): number {
    return this.flips;
  }

  openPass(seed: Uint8Array, blockSize: number, peerParities: readonly Bit[]): void {
    const layout = this.addPass(seed, blockSize);
    if (peerParities.length !== blockCount(layout)) {
      throw new InvalidParameterError('Block parity count does not match the pass layout', [], {
        expected: blockCount(layout),
        received: peerParities.length,
      });
    }
    const pass = this.layouts.length - 1;
    this.peerBlockParities.push([...peerParities]);
    for (let block = 0; block < peerParities.length; block++) {
      this.check(pass, block);
    }
  }

  /**
   * Flattened (pass, start, end) triples to ask about next; empty once the pass is settled
   */
  requests(): number[] {
    this.active = this.active.filter(search => {
      if (this.stillDiffers(search)) {
        return true;
      }
      this.searching.delete(searchKey(search));
      return false;
    });

    const ranges: number[] = [];
    for (const search of this.active) {
      const mid = midpoint(search.start, search.end);
      this.disclose(this.layouts[search.pass], search.start, mid);
      ranges.push(search.pass, search.start, mid);
    }
    return ranges;
  }

  /**
   * Apply the reference parities answering the last requests()
   */
  resolve(parities: readonly Bit[]): void {
    const current = this.active;
    if (parities.length !== current.length) {
      throw new InvalidParameterError('Parity count does not match the request', [], {
        expected: current.length,
        received: parities.length,
      });
    }
    this.active = [];

    current.forEach((search, i) => {
      // an earlier flip in this round may already have evened the range out
      if (!this.stillDiffers(search)) {
        this.searching.delete(searchKey(search));
        return;
      }
      const layout = this.layouts[search.pass];
      const mid = midpoint(search.start, search.end);
      const leftPeer = parities[i];
      const next: Search = rangeParity(this.bits, layout, search.start, mid) !== leftPeer
        ? { ...search, end: mid, peerParity: leftPeer }
        : { ...search, start: mid, peerParity: xor(search.peerParity, leftPeer) };
      this.advance(next);
    });
  }

  private stillDiffers(search: Search): boolean {
    return rangeParity(this.bits, this.layouts[search.pass], search.start, search.end) !== search.peerParity;
  }

  private check(pass: number, block: number): void {
    const key = `${pass}:${block}`;
    if (this.searching.has(key)) {
      return;
    }
    const layout = this.layouts[pass];
    const [start, end] = blockBounds(layout, block);
    const peerParity = this.peerBlockParities[pass][block];
    if (rangeParity(this.bits, layout, start, end) !== peerParity) {
      this.searching.add(key);
      this.advance({ pass, block, start, end, peerParity });
    }
  }

  private advance(search: Search): void {
    if (search.end - search.start > 1) {
      this.active.push(search);
      return;
    }
    this.searching.delete(searchKey(search));
    this.flip(this.layouts[search.pass].permutation[search.start]);
  }

  private flip(index: number): void {
    this.bits[index] = this.bits[index] === 1 ? 0 : 1;
    this.flips++;
    this.layouts.forEach((layout, pass) => {
      this.check(pass, Math.floor(layout.positions[index] / layout.blockSize));
    });
  }
}

function searchKey(search: Search): string {
  return `${search.pass}:${search.block}`;
}
