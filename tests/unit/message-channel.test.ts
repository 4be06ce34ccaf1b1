import { describe, it, expect, afterEach } from 'vitest';
import { MessageChannel, abortReasonFor, errorFromAbort } from '../../src/session/message-channel.js';
import { createLoopbackPair } from '../../src/transport/loopback.js';
import type { Transport } from '../../src/transport/types.js';
import { MessageType, encodeMessage, frameMessage } from '../../src/wire.js';
import { Direction, seal } from '../../src/channel/aead.js';
import { SecretKey } from '../../src/keys/secret.js';
import { Basis } from '../../src/quantum/types.js';
import {
  AuthenticationFailureError,
  EavesdroppingSuspectedError,
  HandshakeTimeoutError,
  InvalidParameterError,
  ReplayDetectedError,
  TransportError,
} from '../../src/error.js';

describe('MessageChannel', () => {
  let local: MessageChannel;
  let remote: MessageChannel;
  let remoteTransport: Transport;

  function connect(): void {
    const [a, b] = createLoopbackPair();
    local = new MessageChannel(a);
    remote = new MessageChannel(b);
    remoteTransport = b;
    local.start();
    remote.start();
  }

  afterEach(async () => {
    await local.close();
    await remote.close();
  });

  it('delivers a control message of the expected type', async () => {
    connect();
    const sent = await remote.send({ type: MessageType.BasisDisclosure, bases: [Basis.Diagonal] });

    const received = await local.expect(MessageType.BasisDisclosure, 1000);
    expect(received.bases).toEqual([Basis.Diagonal]);
    expect(encodeMessage(received)).toEqual(sent);
  });

  it('queues control messages that arrive before they are awaited', async () => {
    connect();
    await remote.send({ type: MessageType.QuantumTransmission, states: [1, 2] });
    await remote.send({ type: MessageType.BasisDisclosure, bases: [Basis.Rectilinear, Basis.Diagonal] });

    expect((await local.expect(MessageType.QuantumTransmission, 1000)).states).toEqual([1, 2]);
    expect((await local.expect(MessageType.BasisDisclosure, 1000)).bases).toHaveLength(2);
  });

  it('rejects a control message of another type', async () => {
    connect();
    await remote.send({ type: MessageType.RotateRequest });
    await expect(local.expect(MessageType.AuthHandshake, 1000)).rejects.toThrow('Unexpected RotateRequest message');
  });

  it('times out when the peer stays silent', async () => {
    connect();
    await expect(local.expect(MessageType.AuthHandshake, 20)).rejects.toBeInstanceOf(HandshakeTimeoutError);
  });

  it('lets a control handler consume messages', async () => {
    connect();
    const consumed: MessageType[] = [];
    local.setHandlers({
      control: message => {
        if (message.type !== MessageType.RotateRequest) return false;
        consumed.push(message.type);
        return true;
      },
    });

    await remote.send({ type: MessageType.RotateRequest });
    await remote.send({ type: MessageType.Close });
    expect(await local.nextFrame()).toBeNull();
    expect(consumed).toEqual([MessageType.RotateRequest]);
  });

  it('separates encrypted frames from control messages', async () => {
    connect();
    const frame = seal(new SecretKey(new Uint8Array(32)), Direction.InitiatorToResponder, 1, 0n, new Uint8Array([1, 2, 3]));
    await remote.send({ type: MessageType.AeadFrame, frame });
    await remote.send({ type: MessageType.RotateRequest });

    await local.expect(MessageType.RotateRequest, 1000);
    expect(local.hasQueuedFrames(1)).toBe(true);
    expect(local.hasQueuedFrames(2)).toBe(false);
    expect(await local.nextFrame()).toEqual(frame);
  });

  it('ends with null on an orderly close', async () => {
    connect();
    const terminations: unknown[] = [];
    local.setHandlers({ terminated: reason => terminations.push(reason) });
    const pending = local.nextFrame();

    await remote.send({ type: MessageType.Close });

    expect(await pending).toBeNull();
    expect(local.isEnded).toBe(true);
    expect(terminations).toEqual([null]);
  });

  it('turns a peer abort into the matching error', async () => {
    connect();
    const pending = local.expect(MessageType.AuthHandshake, 1000);
    await remote.send({ type: MessageType.Abort, reason: 'eavesdropping', message: 'QBER 0.31 above 0.11' });

    await expect(pending).rejects.toThrow('Peer aborted the session: QBER 0.31 above 0.11');
    await expect(local.nextFrame()).rejects.toBeInstanceOf(EavesdroppingSuspectedError);
  });

  it('reports a transport closed mid-handshake', async () => {
    connect();
    const pending = local.expect(MessageType.SampleDisclosure, 1000);
    await remoteTransport.close();
    await expect(pending).rejects.toBeInstanceOf(TransportError);
  });

  it('fails the pump on an undecodable message', async () => {
    connect();
    await remoteTransport.write(frameMessage(new Uint8Array([99])));
    await expect(local.nextFrame()).rejects.toThrow('Unknown message type 99');
  });
});

describe('abort reasons', () => {
  it('maps errors to reasons and back', () => {
    expect(abortReasonFor(new EavesdroppingSuspectedError('x'))).toBe('eavesdropping');
    expect(abortReasonFor(new ReplayDetectedError('x'))).toBe('authentication');
    expect(abortReasonFor(new HandshakeTimeoutError('x'))).toBe('transport');
    expect(abortReasonFor(new Error('x'))).toBe('protocol');

    expect(errorFromAbort('authentication', 'bad signature')).toBeInstanceOf(AuthenticationFailureError);
    expect(errorFromAbort('transport', 'x')).toBeInstanceOf(TransportError);
    const protocol = errorFromAbort('protocol', 'x');
    expect(protocol).toBeInstanceOf(InvalidParameterError);
    expect(protocol.context).toEqual({ peer: true });
  });
});

describe('loopback transport', () => {
  it('delivers bytes in order and copies them', async () => {
    const [a, b] = createLoopbackPair();
    const data = new Uint8Array([1, 2]);
    await a.write(data);
    data[0] = 9;
    await a.write(new Uint8Array([3]));

    expect(await b.read()).toEqual(new Uint8Array([1, 2]));
    expect(await b.read()).toEqual(new Uint8Array([3]));
  });

  it('ends both sides on close', async () => {
    const [a, b] = createLoopbackPair();
    const pending = b.read();
    await a.close();

    expect(await pending).toBeNull();
    expect(await a.read()).toBeNull();
    await expect(b.write(new Uint8Array([1]))).rejects.toThrow('Peer has closed the connection');
    await expect(a.write(new Uint8Array([1]))).rejects.toThrow('Transport is closed');
  });
});
