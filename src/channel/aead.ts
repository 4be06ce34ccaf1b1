/**
 * ChaCha20-Poly1305 frame sealing
 *
 * Nonce (12 bytes) = direction bit || generation (31 bits) || sequence (u64 BE)
 * AAD = FRAME_AAD_LABEL || direction (u8) || generation (u32 BE) || sequence (u64 BE) || optional associated data
 *
 * Both endpoints share one key per generation. The direction bit keeps their
 * nonce spaces apart, and a (direction, generation, sequence) triple is used
 * once, so nonces never repeat under one key instance.
 */

import { chacha20poly1305 } from '@noble/ciphers/chacha';
import { InvalidParameterError, KeyUnavailableError, TagMismatchError } from '../error.js';
import { concat, constantTimeEquals, stringToBytes, writeU32BE, writeU64BE } from '../crypto/utils.js';
import type { SecretKey } from '../keys/secret.js';

export const NONCE_SIZE = 12;
export const TAG_SIZE = 16;

const FRAME_AAD_LABEL = stringToBytes('qkd/v1/frame');
const MAX_GENERATION = 0x7fffffff;
const DIRECTION_BIT = 0x80000000;
const MAX_U64 = (1n << 64n) - 1n;

export enum Direction {
  InitiatorToResponder = 0,
  ResponderToInitiator = 1,
}

export function oppositeDirection(direction: Direction): Direction {
  return direction === Direction.InitiatorToResponder
    ? Direction.ResponderToInitiator
    : Direction.InitiatorToResponder;
}

export interface AeadFrame {
  generation: number;
  sequence: bigint;
  nonce: Uint8Array;
  ciphertext: Uint8Array;
  tag: Uint8Array;
  associatedData?: Uint8Array;
}

function validateCounters(generation: number, sequence: bigint): void {
  if (!Number.isInteger(generation) || generation < 0 || generation > MAX_GENERATION) {
    throw new InvalidParameterError('Generation must fit in 31 bits', [], { generation });
  }
  if (sequence < 0n || sequence > MAX_U64) {
    throw new InvalidParameterError('Sequence must be a u64', [], { sequence });
  }
}

export function buildNonce(direction: Direction, generation: number, sequence: bigint): Uint8Array {
  validateCounters(generation, sequence);
  const high = direction === Direction.ResponderToInitiator ? DIRECTION_BIT + generation : generation;
  return concat(writeU32BE(high), writeU64BE(sequence));
}

export function buildAssociatedData(
  direction: Direction,
  generation: number,
  sequence: bigint,
  extra?: Uint8Array,
): Uint8Array {
  return concat(
    FRAME_AAD_LABEL,
    new Uint8Array([direction]),
    writeU32BE(generation),
    writeU64BE(sequence),
    extra ?? new Uint8Array(0),
  );
}

export function seal(
  key: SecretKey,
  direction: Direction,
  generation: number,
  sequence: bigint,
  plaintext: Uint8Array,
  associatedData?: Uint8Array,
): AeadFrame {
  const nonce = buildNonce(direction, generation, sequence);
  const aad = buildAssociatedData(direction, generation, sequence, associatedData);

  const sealed = key.use(k => chacha20poly1305(k, nonce, aad).encrypt(plaintext));
  const boundary = sealed.length - TAG_SIZE;

  return {
    generation,
    sequence,
    nonce,
    ciphertext: sealed.slice(0, boundary),
    tag: sealed.slice(boundary),
    associatedData: associatedData ? Uint8Array.from(associatedData) : undefined,
  };
}

/**
 * Verify and decrypt a frame sealed for `direction`. No plaintext is returned
 * unless the tag verifies.
 */
export function open(key: SecretKey, direction: Direction, frame: AeadFrame): Uint8Array {
  const expectedNonce = buildNonce(direction, frame.generation, frame.sequence);
  if (constantTimeEquals(buildNonce(oppositeDirection(direction), frame.generation, frame.sequence), frame.nonce)) {
    throw new TagMismatchError('Frame was sealed for the opposite direction', {
      generation: frame.generation,
      sequence: frame.sequence,
    });
  }
  if (frame.nonce.length !== NONCE_SIZE || !constantTimeEquals(expectedNonce, frame.nonce)) {
    throw new TagMismatchError('Frame nonce does not match its generation and sequence', {
      generation: frame.generation,
      sequence: frame.sequence,
    });
  }
  if (frame.tag.length !== TAG_SIZE) {
    throw new TagMismatchError('Authentication tag has wrong length', { length: frame.tag.length });
  }

  const aad = buildAssociatedData(direction, frame.generation, frame.sequence, frame.associatedData);
  const sealed = concat(frame.ciphertext, frame.tag);

  try {
    return key.use(k => chacha20poly1305(k, expectedNonce, aad).decrypt(sealed));
  } catch (error) {
    if (error instanceof KeyUnavailableError) {
      throw error;
    }
    throw new TagMismatchError('Frame authentication failed', {
      generation: frame.generation,
      sequence: frame.sequence,
    });
  }
}
