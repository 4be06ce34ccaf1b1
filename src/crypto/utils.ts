/**
 * Byte helpers shared by the wire codec, key derivation and AEAD framing
 */

import { sha3_256 } from '@noble/hashes/sha3';
import type { Bit } from '../quantum/types.js';

/**
 * Concatenate multiple Uint8Arrays
 */
export function concat(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

export function writeU32BE(value: number): Uint8Array {
  const buf = new Uint8Array(4);
  new DataView(buf.buffer).setUint32(0, value, false);
  return buf;
}

export function writeU64BE(value: bigint): Uint8Array {
  const buf = new Uint8Array(8);
  new DataView(buf.buffer).setBigUint64(0, value, false);
  return buf;
}

export function readU32BE(bytes: Uint8Array, offset = 0): number {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(offset, false);
}

export function readU64BE(bytes: Uint8Array, offset = 0): bigint {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getBigUint64(offset, false);
}

/**
 * u32 BE length followed by the bytes
 */
export function writeLengthPrefixedBytes(bytes: Uint8Array): Uint8Array {
  return concat(writeU32BE(bytes.length), bytes);
}

/**
 * Pack bits MSB-first; the final byte is zero-padded
 */
export function packBits(bits: readonly Bit[]): Uint8Array {
  const packed = new Uint8Array(Math.ceil(bits.length / 8));
  bits.forEach((bit, i) => {
    if (bit) {
      packed[i >> 3] |= 0x80 >> (i & 7);
    }
  });
  return packed;
}

/**
 * Constant-time comparison to prevent timing attacks
 */
export function constantTimeEquals(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;

  let result = 0;
  for (let i = 0; i < a.length; i++) {
    result |= a[i] ^ b[i];
  }

  return result === 0;
}

export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes, (byte) => `0${byte.toString(16)}`.slice(-2)).join('');
}

export function stringToBytes(str: string): Uint8Array {
  return new TextEncoder().encode(str);
}

export function bytesToString(bytes: Uint8Array): string {
  return new TextDecoder().decode(bytes);
}

/**
 * SHA3-256 over the concatenation of the given parts
 */
export function transcriptHash(...parts: Uint8Array[]): Uint8Array {
  const hash = sha3_256.create();
  for (const part of parts) {
    hash.update(part);
  }
  return hash.digest();
}
