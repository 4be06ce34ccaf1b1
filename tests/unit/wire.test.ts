import { describe, it, expect } from 'vitest';
import cbor from 'cbor';
import {
  FrameDecoder,
  MessageType,
  decodeMessage,
  encodeMessage,
  frameMessage,
  packSymbols,
  unpackSymbols,
  type WireMessage,
} from '../../src/wire.js';
import { Direction, seal } from '../../src/channel/aead.js';
import { SecretKey } from '../../src/keys/secret.js';
import { Basis } from '../../src/quantum/types.js';
import { InvalidParameterError, TransportError } from '../../src/error.js';

describe('Wire Protocol', () => {
  describe('framing', () => {
    it('prefixes a big-endian length', () => {
      expect(Array.from(frameMessage(new Uint8Array([9, 8, 7])))).toEqual([0, 0, 0, 3, 9, 8, 7]);
    });

    it('refuses messages over the size limit', () => {
      expect(() => frameMessage(new Uint8Array(11), 10)).toThrow(TransportError);
    });
  });

  describe('FrameDecoder', () => {
    it('reassembles messages split across chunks', () => {
      const decoder = new FrameDecoder();
      const stream = new Uint8Array([...frameMessage(new Uint8Array([1, 2])), ...frameMessage(new Uint8Array([3]))]);

      expect(decoder.push(stream.subarray(0, 3))).toEqual([]);
      expect(decoder.push(stream.subarray(3, 5))).toEqual([]);
      expect(decoder.pending).toBe(5);

      const messages = decoder.push(stream.subarray(5));
      expect(messages.map(message => Array.from(message))).toEqual([[1, 2], [3]]);
      expect(decoder.pending).toBe(0);
    });

    it('rejects an announced length over the limit before buffering the body', () => {
      const decoder = new FrameDecoder(8);
      expect(() => decoder.push(new Uint8Array([0, 0, 0, 9]))).toThrow('Message too large: 9 > 8');
    });

    it('handles empty messages', () => {
      const decoder = new FrameDecoder();
      expect(decoder.push(new Uint8Array([0, 0, 0, 0]))).toEqual([new Uint8Array(0)]);
    });
  });

  describe('symbol packing', () => {
    it('packs four symbols per byte, first symbol high', () => {
      expect(Array.from(packSymbols([3, 0, 1, 2, 1]))).toEqual([0b11000110, 0b01000000]);
    });

    it('unpacks the requested count', () => {
      expect(unpackSymbols(new Uint8Array([0b11000110, 0b01000000]), 5)).toEqual([3, 0, 1, 2, 1]);
    });

    it('fails when the count exceeds the packed length', () => {
      expect(() => unpackSymbols(new Uint8Array(1), 5)).toThrow(InvalidParameterError);
    });
  });

  describe('message codec', () => {
    const controlMessages: WireMessage[] = [
      { type: MessageType.QuantumTransmission, states: [0, 1, 2, 3, 3, 2, 1] },
      { type: MessageType.BasisDisclosure, bases: [Basis.Diagonal, Basis.Rectilinear, Basis.Diagonal] },
      { type: MessageType.SampleDisclosure, indices: [0, 7, 70000], bits: [1, 0, 1] },
      {
        type: MessageType.AuthHandshake,
        identity: new Uint8Array([1, 2, 3]),
        nonce: new Uint8Array(16).fill(4),
        kem: new Uint8Array([5, 6]),
        signature: new Uint8Array([7]),
      },
      { type: MessageType.RotateRequest },
      { type: MessageType.Close },
      { type: MessageType.Abort, reason: 'eavesdropping', message: 'QBER 0.30 exceeds threshold 0.11' },
    ];

    for (const message of controlMessages) {
      it(`restores a ${MessageType[message.type]} message`, () => {
        const encoded = encodeMessage(message);
        expect(encoded[0]).toBe(message.type);
        expect(decodeMessage(encoded)).toEqual(message);
      });
    }

    it('restores an encrypted frame with and without associated data', () => {
      const key = new SecretKey(new Uint8Array(32).fill(1));
      for (const aad of [undefined, new Uint8Array([0xaa, 0xbb])]) {
        const frame = seal(key, Direction.ResponderToInitiator, 4, 1234n, new Uint8Array([1, 2, 3, 4, 5]), aad);
        const decoded = decodeMessage(encodeMessage({ type: MessageType.AeadFrame, frame }));
        expect(decoded).toEqual({ type: MessageType.AeadFrame, frame });
      }
    });

    it('maps an unknown abort reason to protocol', () => {
      const body = cbor.encode({ reason: 'solar flare', message: 'gone' });
      const decoded = decodeMessage(new Uint8Array([MessageType.Abort, ...body]));
      expect(decoded).toEqual({ type: MessageType.Abort, reason: 'protocol', message: 'gone' });
    });

    describe('malformed input', () => {
      it('rejects an empty message', () => {
        expect(() => decodeMessage(new Uint8Array(0))).toThrow('Empty message');
      });

      it('rejects an unknown type byte', () => {
        expect(() => decodeMessage(new Uint8Array([99, 0xa0]))).toThrow('Unknown message type 99');
      });

      it('rejects a body that is not a map', () => {
        // CBOR empty array
        expect(() => decodeMessage(new Uint8Array([MessageType.Close, 0x80]))).toThrow(
          'Message body must be a CBOR map',
        );
      });

      it('rejects a map with missing fields', () => {
        // CBOR empty map
        expect(() => decodeMessage(new Uint8Array([MessageType.QuantumTransmission, 0xa0]))).toThrow(
          "Expected byte string field 's'",
        );
      });

      it('rejects basis symbols above 1', () => {
        // symbols packed two bits each: 10 11
        const body = cbor.encode({ n: 2, b: Buffer.from([0b1011_0000]) });
        const encoded = new Uint8Array([MessageType.BasisDisclosure, ...body]);
        expect(() => decodeMessage(encoded)).toThrow('Basis symbol out of range');
      });

      it('rejects a truncated encrypted frame', () => {
        expect(() => decodeMessage(new Uint8Array([MessageType.AeadFrame, 0, 0, 0, 1]))).toThrow(
          'Encrypted frame too short',
        );
      });
    });
  });
});
