/**
 * Message layer between the orchestrator and a transport
 *
 * A single pump reads the transport, decodes messages and sorts them into a
 * control queue (handshake and session control) and a frame queue
 * (encrypted application data). Close and Abort from the peer end the pump.
 */

import {
  AuthenticationFailureError,
  EavesdroppingSuspectedError,
  HandshakeTimeoutError,
  InvalidParameterError,
  SessionError,
  TransportError,
  errorMessage,
} from '../error.js';
import type { AeadFrame } from '../channel/aead.js';
import type { Transport } from '../transport/types.js';
import {
  AbortReason,
  ControlMessage,
  DEFAULT_MAX_MESSAGE_SIZE,
  FrameDecoder,
  MessageType,
  WireMessage,
  decodeMessage,
  encodeMessage,
  frameMessage,
} from '../wire.js';

export type ControlType = ControlMessage['type'];
export type ControlOf<T extends ControlType> = Extract<ControlMessage, { type: T }>;

/** Why the inbound side stopped: null for an orderly close */
export type Termination = SessionError | null;

export interface MessageChannelHandlers {
  /**
   * Offered every control message before it is queued. Return true to consume it.
   */
  control?: (message: ControlMessage) => boolean;
  /** Called once when the peer closes, aborts or the transport fails */
  terminated?: (reason: Termination) => void;
}

interface Pending<T> {
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

/**
 * Error raised locally when the peer reports an abort
 */
export function errorFromAbort(reason: AbortReason, message: string): SessionError {
  const text = `Peer aborted the session: ${message}`;
  switch (reason) {
    case 'eavesdropping':
      return new EavesdroppingSuspectedError(text, { peer: true });
    case 'authentication':
      return new AuthenticationFailureError(text, { peer: true });
    case 'transport':
      return new TransportError(text, { peer: true });
    case 'protocol':
      return new InvalidParameterError(text, [], { peer: true });
  }
}

export function abortReasonFor(error: unknown): AbortReason {
  if (error instanceof EavesdroppingSuspectedError) return 'eavesdropping';
  if (error instanceof AuthenticationFailureError) return 'authentication';
  if (error instanceof TransportError) return 'transport';
  return 'protocol';
}

export class MessageChannel {
  private readonly decoder: FrameDecoder;
  private readonly controls: ControlMessage[] = [];
  private readonly frames: AeadFrame[] = [];
  private controlWaiter: Pending<ControlMessage> | null = null;
  private frameWaiter: Pending<AeadFrame | null> | null = null;
  private pumping: Promise<void> | null = null;
  private ended = false;
  private termination: Termination = null;
  private handlers: MessageChannelHandlers = {};

  constructor(
    private readonly transport: Transport,
    private readonly maxMessageSize: number = DEFAULT_MAX_MESSAGE_SIZE,
  ) {
    this.decoder = new FrameDecoder(maxMessageSize);
  }

  setHandlers(handlers: MessageChannelHandlers): void {
    this.handlers = handlers;
  }

  /**
   * Start reading the transport. Idempotent.
   */
  start(): void {
    if (!this.pumping) {
      this.pumping = this.pump();
    }
  }

  get isEnded(): boolean {
    return this.ended;
  }

  async send(message: WireMessage): Promise<Uint8Array> {
    const encoded = encodeMessage(message);
    await this.transport.write(frameMessage(encoded, this.maxMessageSize));
    return encoded;
  }

  /**
   * Next control message, which must be of the given type.
   * Rejects with HandshakeTimeoutError when nothing arrives within timeoutMs.
   */
  async expect<T extends ControlType>(type: T, timeoutMs: number): Promise<ControlOf<T>> {
    const message = await this.nextControl(timeoutMs, type);
    if (!isControlOf(message, type)) {
      throw new InvalidParameterError(`Unexpected ${MessageType[message.type]} message`, [], {
        expected: MessageType[type],
        received: MessageType[message.type],
      });
    }
    return message;
  }

  /**
   * Next encrypted frame, or null once the peer has closed
   */
  async nextFrame(): Promise<AeadFrame | null> {
    const frame = this.frames.shift();
    if (frame) {
      return frame;
    }
    if (this.termination) {
      throw this.termination;
    }
    if (this.ended) {
      return null;
    }
    if (this.frameWaiter) {
      throw new InvalidParameterError('Only one receive may be pending at a time');
    }
    return new Promise((resolve, reject) => {
      this.frameWaiter = { resolve, reject };
    });
  }

  /**
   * True while a queued inbound frame belongs to the generation (any generation when omitted)
   */
  hasQueuedFrames(generation?: number): boolean {
    return this.frames.some(frame => generation === undefined || frame.generation === generation);
  }

  /**
   * Close the transport and wait for the pump to stop
   */
  async close(): Promise<void> {
    await this.transport.close();
    await this.pumping;
  }

  private nextControl(timeoutMs: number, type: ControlType): Promise<ControlMessage> {
    const queued = this.controls.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.termination) {
      return Promise.reject(this.termination);
    }
    if (this.ended) {
      return Promise.reject(new TransportError('Connection closed during handshake', { expected: MessageType[type] }));
    }
    if (this.controlWaiter) {
      return Promise.reject(new InvalidParameterError('Only one handshake read may be pending at a time'));
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.controlWaiter = null;
        reject(new HandshakeTimeoutError(`Timed out waiting for ${MessageType[type]}`, { timeoutMs }));
      }, timeoutMs);

      this.controlWaiter = {
        resolve: message => {
          clearTimeout(timer);
          resolve(message);
        },
        reject: error => {
          clearTimeout(timer);
          reject(error);
        },
      };
    });
  }

  private async pump(): Promise<void> {
    try {
      while (!this.ended) {
        const chunk = await this.transport.read();
        if (chunk === null) {
          this.end(null);
          return;
        }
        for (const bytes of this.decoder.push(chunk)) {
          this.dispatch(decodeMessage(bytes));
          if (this.ended) {
            return;
          }
        }
      }
    } catch (error) {
      this.end(error instanceof SessionError ? error : new TransportError(`Transport read failed: ${errorMessage(error)}`));
    }
  }

  private dispatch(message: WireMessage): void {
    switch (message.type) {
      case MessageType.AeadFrame:
        if (this.frameWaiter) {
          const waiter = this.frameWaiter;
          this.frameWaiter = null;
          waiter.resolve(message.frame);
        } else {
          this.frames.push(message.frame);
        }
        return;
      case MessageType.Close:
        this.end(null);
        return;
      case MessageType.Abort:
        this.end(errorFromAbort(message.reason, message.message));
        return;
      default:
        if (this.handlers.control?.(message)) {
          return;
        }
        if (this.controlWaiter) {
          const waiter = this.controlWaiter;
          this.controlWaiter = null;
          waiter.resolve(message);
        } else {
          this.controls.push(message);
        }
    }
  }

  private end(reason: Termination): void {
    if (this.ended) return;
    this.ended = true;
    this.termination = reason;

    const controlWaiter = this.controlWaiter;
    this.controlWaiter = null;
    controlWaiter?.reject(reason ?? new TransportError('Connection closed during handshake'));

    const frameWaiter = this.frameWaiter;
    this.frameWaiter = null;
    if (frameWaiter) {
      if (reason) {
        frameWaiter.reject(reason);
      } else {
        frameWaiter.resolve(null);
      }
    }

    this.handlers.terminated?.(reason);
  }
}

function isControlOf<T extends ControlType>(message: ControlMessage, type: T): message is ControlOf<T> {
  return message.type === type;
}
