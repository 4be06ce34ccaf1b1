import { sha3_256 } from '@noble/hashes/sha3';
import { randomBytes } from '@noble/hashes/utils';

/**
 * Source of uniformly random bytes. Injected so tests can replay exact streams.
 */
export type RandomSource = (length: number) => Uint8Array;

export const defaultRandom: RandomSource = (length: number) => randomBytes(length);

/**
 * Deterministic byte stream from a seed: SHA3-256(seed || counter) blocks.
 * Both endpoints expand the same shared seed into the same stream.
 */
export function expandSeed(seed: Uint8Array): RandomSource {
  let counter = 0;
  let pool = new Uint8Array(0);

  return (length: number) => {
    while (pool.length < length) {
      const input = new Uint8Array(seed.length + 4);
      input.set(seed);
      new DataView(input.buffer).setUint32(seed.length, counter++, false);
      const block = sha3_256(input);
      const next = new Uint8Array(pool.length + block.length);
      next.set(pool);
      next.set(block, pool.length);
      pool = next;
    }
    const out = pool.slice(0, length);
    pool = pool.slice(length);
    return out;
  };
}

const UINT32_RANGE = 0x1_0000_0000;

function readUint32(random: RandomSource): number {
  const bytes = random(4);
  return new DataView(bytes.buffer, bytes.byteOffset, 4).getUint32(0, false);
}

/**
 * Uniform float in [0, 1)
 */
export function randomUnit(random: RandomSource): number {
  return readUint32(random) / UINT32_RANGE;
}

/**
 * Uniform integer in [0, max) by rejection sampling
 */
export function randomInt(max: number, random: RandomSource): number {
  if (max <= 0 || max > UINT32_RANGE) {
    throw new RangeError(`randomInt bound out of range: ${max}`);
  }
  const limit = UINT32_RANGE - (UINT32_RANGE % max);
  for (;;) {
    const value = readUint32(random);
    if (value < limit) {
      return value % max;
    }
  }
}
