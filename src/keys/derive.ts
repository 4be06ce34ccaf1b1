/**
 * Hybrid session key derivation
 *
 * IKM = u32(bitCount) || LP(quantum bits, MSB-first)
 *       || LP(classical entropy)
 *       || LP(authenticated secret)
 * Session key = HKDF-SHA3-256(IKM, salt = SESSION_KEY_SALT, info = SESSION_KEY_INFO)
 *
 * LP(x) is a u32 big-endian length prefix followed by x. The order is fixed.
 */

import { sha3_256 } from '@noble/hashes/sha3';
import { hkdf } from '@noble/hashes/hkdf';
import { InsufficientEntropyError } from '../error.js';
import { assertValid, validateKeyLength } from '../validation.js';
import { concat, packBits, stringToBytes, writeLengthPrefixedBytes, writeU32BE } from '../crypto/utils.js';
import type { Bit } from '../quantum/types.js';
import { SecretKey } from './secret.js';

const SESSION_KEY_SALT = 'QKD-HYBRID-v1-SESSION-KEY-DERIVATION';
const SESSION_KEY_INFO = 'QKD-HYBRID-SESSION';
const SESSION_ID_LABEL = 'qkd/v1/session_id';

/** 128 bits */
export const MIN_CLASSICAL_ENTROPY_BYTES = 16;

export function derive(
  quantumKeyBits: readonly Bit[],
  classicalEntropy: Uint8Array,
  authenticatedSecret: Uint8Array,
  keyLengthBits = 256,
): SecretKey {
  assertValid(validateKeyLength(keyLengthBits), 'Invalid key length');

  if (quantumKeyBits.length === 0) {
    throw new InsufficientEntropyError('No quantum key material available', { quantumBits: 0 });
  }
  if (classicalEntropy.length < MIN_CLASSICAL_ENTROPY_BYTES) {
    throw new InsufficientEntropyError('Classical entropy below minimum length', {
      classicalBytes: classicalEntropy.length,
      minimum: MIN_CLASSICAL_ENTROPY_BYTES,
    });
  }

  const packed = packBits(quantumKeyBits);
  const ikm = concat(
    writeU32BE(quantumKeyBits.length),
    writeLengthPrefixedBytes(packed),
    writeLengthPrefixedBytes(classicalEntropy),
    writeLengthPrefixedBytes(authenticatedSecret),
  );

  try {
    const okm = hkdf(sha3_256, ikm, stringToBytes(SESSION_KEY_SALT), stringToBytes(SESSION_KEY_INFO), keyLengthBits / 8);
    return new SecretKey(okm);
  } finally {
    packed.fill(0);
    ikm.fill(0);
  }
}

/**
 * Public session identifier, safe to log
 * SessionId = SHA3-256(label || session key || initiator nonce || responder nonce)
 */
export function deriveSessionId(
  sessionKey: SecretKey,
  initiatorNonce: Uint8Array,
  responderNonce: Uint8Array,
): Uint8Array {
  const label = stringToBytes(SESSION_ID_LABEL);
  return sessionKey.use(key => {
    const input = concat(label, key, initiatorNonce, responderNonce);
    try {
      return sha3_256(input);
    } finally {
      input.fill(0);
    }
  });
}
