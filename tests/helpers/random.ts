import { expandSeed, type RandomSource } from '../../src/quantum/random.js';

/**
 * Deterministic byte stream named by a string
 */
export function seededRandom(seed: string): RandomSource {
  return expandSeed(new TextEncoder().encode(seed));
}

/**
 * Hands out exactly the given bytes, in order
 */
export function scriptedRandom(bytes: number[]): RandomSource {
  const queue = [...bytes];
  return (length: number) => {
    if (queue.length < length) {
      throw new Error(`scripted random exhausted: wanted ${length}, have ${queue.length}`);
    }
    return Uint8Array.from(queue.splice(0, length));
  };
}
