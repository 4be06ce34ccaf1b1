/**
 * Session wire protocol encoding/decoding
 *
 * Frame   = 4-byte big-endian length || message
 * Message = 1 type byte || body
 *
 * Control messages carry a CBOR map body. Encrypted application frames use a
 * fixed binary layout:
 *   generation u32 BE || sequence u64 BE || nonce (12) || tag (16)
 *   || hasAad u8 || [aadLen u32 BE || aad] || ciphertext
 *
 * Max message size: 16MB unless configured lower.
 */

import cbor from 'cbor';
import { InvalidParameterError, TransportError } from './error.js';
import { NONCE_SIZE, TAG_SIZE, type AeadFrame } from './channel/aead.js';
import { concat, packBits, readU32BE, readU64BE, writeU32BE, writeU64BE } from './crypto/utils.js';
import { Basis, type Bit } from './quantum/types.js';

export const DEFAULT_MAX_MESSAGE_SIZE = 16 * 1024 * 1024; // 16MB
const FRAME_HEADER_SIZE = 4; // 4-byte big-endian length

export enum MessageType {
  QuantumTransmission = 1,
  BasisDisclosure = 2,
  SampleDisclosure = 3,
  AuthHandshake = 4,
  AeadFrame = 5,
  RotateRequest = 6,
  Close = 7,
  Abort = 8,
  ReconcileBlocks = 9,
  ReconcileRequest = 10,
  ReconcileParities = 11,
  ReconcileConfirm = 12,
}

export type AbortReason = 'eavesdropping' | 'authentication' | 'transport' | 'protocol';

export interface QuantumTransmissionMessage {
  type: MessageType.QuantumTransmission;
  /** 2-bit symbols, bit in the low bit and basis in the high bit */
  states: number[];
}

export interface BasisDisclosureMessage {
  type: MessageType.BasisDisclosure;
  bases: Basis[];
}

export interface SampleDisclosureMessage {
  type: MessageType.SampleDisclosure;
  indices: number[];
  bits: Bit[];
}

export interface AuthHandshakeMessage {
  type: MessageType.AuthHandshake;
  identity: Uint8Array;
  nonce: Uint8Array;
  /** KEM public key from the initiator, KEM ciphertext from the responder */
  kem: Uint8Array;
  signature: Uint8Array;
}

/** Opens a reconciliation pass: permutation seed, block size and the initiator's block parities */
export interface ReconcileBlocksMessage {
  type: MessageType.ReconcileBlocks;
  seed: Uint8Array;
  blockSize: number;
  parities: Bit[];
}

/** Flattened (pass, start, end) ranges whose parity the responder needs; empty ends the pass */
export interface ReconcileRequestMessage {
  type: MessageType.ReconcileRequest;
  ranges: number[];
}

export interface ReconcileParitiesMessage {
  type: MessageType.ReconcileParities;
  parities: Bit[];
}

export interface ReconcileConfirmMessage {
  type: MessageType.ReconcileConfirm;
  tag: Uint8Array;
}

export interface AeadFrameMessage {
  type: MessageType.AeadFrame;
  frame: AeadFrame;
}

export interface RotateRequestMessage {
  type: MessageType.RotateRequest;
}

export interface CloseMessage {
  type: MessageType.Close;
}

export interface AbortMessage {
  type: MessageType.Abort;
  reason: AbortReason;
  message: string;
}

export type WireMessage =
  | QuantumTransmissionMessage
  | BasisDisclosureMessage
  | SampleDisclosureMessage
  | AuthHandshakeMessage
  | ReconcileBlocksMessage
  | ReconcileRequestMessage
  | ReconcileParitiesMessage
  | ReconcileConfirmMessage
  | AeadFrameMessage
  | RotateRequestMessage
  | CloseMessage
  | AbortMessage;

export type ControlMessage = Exclude<WireMessage, AeadFrameMessage>;

// ============================================================================
// Framing
// ============================================================================

/**
 * Frame a message with 4-byte big-endian length prefix
 */
export function frameMessage(message: Uint8Array, maxSize: number = DEFAULT_MAX_MESSAGE_SIZE): Uint8Array {
  if (message.length > maxSize) {
    throw new TransportError(`Message too large: ${message.length} > ${maxSize}`, { size: message.length, maxSize });
  }

  const frame = new Uint8Array(FRAME_HEADER_SIZE + message.length);
  const view = new DataView(frame.buffer);
  view.setUint32(0, message.length, false); // big-endian
  frame.set(message, FRAME_HEADER_SIZE);
  return frame;
}

/**
 * Reassembles length-prefixed messages from an arbitrary chunking of the byte stream
 */
export class FrameDecoder {
  private buffer: Uint8Array = new Uint8Array(0);

  constructor(private readonly maxSize: number = DEFAULT_MAX_MESSAGE_SIZE) {}

  /**
   * Append a chunk and return every message it completes
   */
  push(chunk: Uint8Array): Uint8Array[] {
    this.buffer = this.buffer.length === 0 ? Uint8Array.from(chunk) : concat(this.buffer, chunk);

    const messages: Uint8Array[] = [];
    while (this.buffer.length >= FRAME_HEADER_SIZE) {
      const length = readU32BE(this.buffer);
      // Protect against memory exhaustion before buffering the body
      if (length > this.maxSize) {
        throw new TransportError(`Message too large: ${length} > ${this.maxSize}`, { size: length, maxSize: this.maxSize });
      }
      if (this.buffer.length < FRAME_HEADER_SIZE + length) {
        break;
      }
      messages.push(this.buffer.slice(FRAME_HEADER_SIZE, FRAME_HEADER_SIZE + length));
      this.buffer = this.buffer.subarray(FRAME_HEADER_SIZE + length);
    }
    return messages;
  }

  /**
   * Bytes held back waiting for the rest of a message
   */
  get pending(): number {
    return this.buffer.length;
  }
}

// ============================================================================
// Symbol packing
// ============================================================================

/**
 * Pack 2-bit symbols, four per byte, first symbol in the high bits
 */
export function packSymbols(symbols: readonly number[]): Uint8Array {
  const packed = new Uint8Array(Math.ceil(symbols.length / 4));
  symbols.forEach((symbol, i) => {
    packed[i >> 2] |= (symbol & 0b11) << (6 - 2 * (i & 3));
  });
  return packed;
}

export function unpackSymbols(packed: Uint8Array, count: number): number[] {
  if (count > packed.length * 4) {
    throw new InvalidParameterError('Symbol count exceeds packed length', [], { count, bytes: packed.length });
  }
  return Array.from({ length: count }, (_, i) => (packed[i >> 2] >> (6 - 2 * (i & 3))) & 0b11);
}

function unpackBits(packed: Uint8Array, count: number): Bit[] {
  if (count > packed.length * 8) {
    throw new InvalidParameterError('Bit count exceeds packed length', [], { count, bytes: packed.length });
  }
  return Array.from({ length: count }, (_, i) => ((packed[i >> 3] >> (7 - (i & 7))) & 1 ? 1 : 0));
}

// ============================================================================
// Message codec
// ============================================================================

function encodeIndices(indices: readonly number[]): Uint8Array {
  return concat(...indices.map(index => writeU32BE(index)));
}

function decodeIndices(bytes: Uint8Array): number[] {
  if (bytes.length % 4 !== 0) {
    throw new InvalidParameterError('Index list is not a multiple of 4 bytes', [], { bytes: bytes.length });
  }
  return Array.from({ length: bytes.length / 4 }, (_, i) => readU32BE(bytes, i * 4));
}

function encodeFrame(frame: AeadFrame): Uint8Array {
  const aad = frame.associatedData;
  return concat(
    writeU32BE(frame.generation),
    writeU64BE(frame.sequence),
    frame.nonce,
    frame.tag,
    aad ? concat(new Uint8Array([1]), writeU32BE(aad.length), aad) : new Uint8Array([0]),
    frame.ciphertext,
  );
}

const FRAME_FIXED_SIZE = 4 + 8 + NONCE_SIZE + TAG_SIZE + 1;

function decodeFrame(body: Uint8Array): AeadFrame {
  if (body.length < FRAME_FIXED_SIZE) {
    throw new InvalidParameterError('Encrypted frame too short', [], { length: body.length });
  }

  let offset = 0;
  const generation = readU32BE(body, offset);
  offset += 4;
  const sequence = readU64BE(body, offset);
  offset += 8;
  const nonce = body.slice(offset, offset + NONCE_SIZE);
  offset += NONCE_SIZE;
  const tag = body.slice(offset, offset + TAG_SIZE);
  offset += TAG_SIZE;
  const hasAad = body[offset++];

  let associatedData: Uint8Array | undefined;
  if (hasAad === 1) {
    if (body.length < offset + 4) {
      throw new InvalidParameterError('Encrypted frame truncated in associated data', []);
    }
    const aadLength = readU32BE(body, offset);
    offset += 4;
    if (body.length < offset + aadLength) {
      throw new InvalidParameterError('Encrypted frame truncated in associated data', [], { aadLength });
    }
    associatedData = body.slice(offset, offset + aadLength);
    offset += aadLength;
  } else if (hasAad !== 0) {
    throw new InvalidParameterError('Invalid associated data flag', [], { flag: hasAad });
  }

  return {
    generation,
    sequence,
    nonce,
    tag,
    associatedData,
    ciphertext: body.slice(offset),
  };
}

function controlBody(message: ControlMessage): Record<string, unknown> {
  switch (message.type) {
    case MessageType.QuantumTransmission:
      return { n: message.states.length, s: Buffer.from(packSymbols(message.states)) };
    case MessageType.BasisDisclosure:
      return { n: message.bases.length, b: Buffer.from(packSymbols(message.bases)) };
    case MessageType.SampleDisclosure:
      return {
        i: Buffer.from(encodeIndices(message.indices)),
        n: message.bits.length,
        b: Buffer.from(packBits(message.bits)),
      };
    case MessageType.AuthHandshake:
      return {
        id: Buffer.from(message.identity),
        nonce: Buffer.from(message.nonce),
        kem: Buffer.from(message.kem),
        sig: Buffer.from(message.signature),
      };
    case MessageType.ReconcileBlocks:
      return {
        s: Buffer.from(message.seed),
        k: message.blockSize,
        n: message.parities.length,
        p: Buffer.from(packBits(message.parities)),
      };
    case MessageType.ReconcileRequest:
      return { r: Buffer.from(encodeIndices(message.ranges)) };
    case MessageType.ReconcileParities:
      return { n: message.parities.length, p: Buffer.from(packBits(message.parities)) };
    case MessageType.ReconcileConfirm:
      return { t: Buffer.from(message.tag) };
    case MessageType.RotateRequest:
    case MessageType.Close:
      return {};
    case MessageType.Abort:
      return { reason: message.reason, message: message.message };
  }
}

/**
 * Encode a message (without the length prefix)
 */
export function encodeMessage(message: WireMessage): Uint8Array {
  const body = message.type === MessageType.AeadFrame
    ? encodeFrame(message.frame)
    : new Uint8Array(cbor.encode(controlBody(message)));
  return concat(new Uint8Array([message.type]), body);
}

type CborMap = Record<string, unknown>;

function isCborMap(value: unknown): value is CborMap {
  return typeof value === 'object' && value !== null && !(value instanceof Uint8Array) && !Array.isArray(value);
}

function readBytes(map: CborMap, key: string): Uint8Array {
  const value = map[key];
  if (!(value instanceof Uint8Array)) {
    throw new InvalidParameterError(`Expected byte string field '${key}'`);
  }
  return new Uint8Array(value);
}

function readCount(map: CborMap, key: string): number {
  const value = map[key];
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw new InvalidParameterError(`Expected unsigned integer field '${key}'`);
  }
  return value;
}

function readString(map: CborMap, key: string): string {
  const value = map[key];
  if (typeof value !== 'string') {
    throw new InvalidParameterError(`Expected text field '${key}'`);
  }
  return value;
}

const ABORT_REASONS: readonly AbortReason[] = ['eavesdropping', 'authentication', 'transport', 'protocol'];

function isAbortReason(value: string): value is AbortReason {
  return ABORT_REASONS.some(reason => reason === value);
}

function toBasis(symbol: number): Basis {
  return symbol === Basis.Diagonal ? Basis.Diagonal : Basis.Rectilinear;
}

function decodeControl(type: MessageType, body: Uint8Array): ControlMessage {
  let decoded: unknown;
  try {
    decoded = cbor.decodeFirstSync(Buffer.from(body));
  } catch (error) {
    throw new InvalidParameterError(`Malformed message body: ${error instanceof Error ? error.message : 'unknown'}`, [], { type });
  }
  if (!isCborMap(decoded)) {
    throw new InvalidParameterError('Message body must be a CBOR map', [], { type });
  }

  switch (type) {
    case MessageType.QuantumTransmission:
      return { type, states: unpackSymbols(readBytes(decoded, 's'), readCount(decoded, 'n')) };
    case MessageType.BasisDisclosure: {
      const symbols = unpackSymbols(readBytes(decoded, 'b'), readCount(decoded, 'n'));
      if (symbols.some(symbol => symbol > 1)) {
        throw new InvalidParameterError('Basis symbol out of range');
      }
      return { type, bases: symbols.map(toBasis) };
    }
    case MessageType.SampleDisclosure:
      return {
        type,
        indices: decodeIndices(readBytes(decoded, 'i')),
        bits: unpackBits(readBytes(decoded, 'b'), readCount(decoded, 'n')),
      };
    case MessageType.AuthHandshake:
      return {
        type,
        identity: readBytes(decoded, 'id'),
        nonce: readBytes(decoded, 'nonce'),
        kem: readBytes(decoded, 'kem'),
        signature: readBytes(decoded, 'sig'),
      };
    case MessageType.ReconcileBlocks:
      return {
        type,
        seed: readBytes(decoded, 's'),
        blockSize: readCount(decoded, 'k'),
        parities: unpackBits(readBytes(decoded, 'p'), readCount(decoded, 'n')),
      };
    case MessageType.ReconcileRequest:
      return { type, ranges: decodeIndices(readBytes(decoded, 'r')) };
    case MessageType.ReconcileParities:
      return { type, parities: unpackBits(readBytes(decoded, 'p'), readCount(decoded, 'n')) };
    case MessageType.ReconcileConfirm:
      return { type, tag: readBytes(decoded, 't') };
    case MessageType.RotateRequest:
      return { type };
    case MessageType.Close:
      return { type };
    case MessageType.Abort: {
      const reason = readString(decoded, 'reason');
      return {
        type,
        reason: isAbortReason(reason) ? reason : 'protocol',
        message: readString(decoded, 'message'),
      };
    }
    case MessageType.AeadFrame:
      throw new InvalidParameterError('Encrypted frames are not CBOR encoded');
  }
}

function toMessageType(value: number): MessageType {
  switch (value) {
    case MessageType.QuantumTransmission:
    case MessageType.BasisDisclosure:
    case MessageType.SampleDisclosure:
    case MessageType.AuthHandshake:
    case MessageType.AeadFrame:
    case MessageType.RotateRequest:
    case MessageType.Close:
    case MessageType.Abort:
    case MessageType.ReconcileBlocks:
    case MessageType.ReconcileRequest:
    case MessageType.ReconcileParities:
    case MessageType.ReconcileConfirm:
      return value;
    default:
      throw new InvalidParameterError(`Unknown message type ${value}`, [], { type: value });
  }
}

/**
 * Decode a message (without the length prefix)
 */
export function decodeMessage(message: Uint8Array): WireMessage {
  if (message.length < 1) {
    throw new InvalidParameterError('Empty message');
  }

  const type = toMessageType(message[0]);
  const body = message.subarray(1);

  if (type === MessageType.AeadFrame) {
    return { type, frame: decodeFrame(body) };
  }
  return decodeControl(type, body);
}
