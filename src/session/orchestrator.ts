/**
 * Session orchestrator
 *
 * Drives one endpoint through the session lifecycle:
 * 1. Quantum exchange: initiator prepares and sends states, responder measures
 * 2. Sifting: both disclose bases and keep matching positions
 * 3. QBER check: initiator picks sample positions, both disclose their bits there
 * 3a. Reconciliation: parity passes correct the responder's bits against the
 *     initiator's, then both exchange a confirmation tag over the result
 * 4. Authentication: signed hellos over the handshake transcript, ML-KEM-1024
 *    encapsulation from responder to initiator
 * 5. Key derivation: reconciled quantum bits + both nonces + KEM secret
 * 6. Active messaging with rotation, then close
 *
 * Any failure erases the key material of the attempt and moves the session
 * to `aborted`; the peer is told why with an Abort message.
 */

import {
  AuthenticationFailureError,
  EavesdroppingSuspectedError,
  InsufficientKeyMaterialError,
  InvalidParameterError,
  ReconciliationFailedError,
  SessionError,
  TransportError,
  errorMessage,
  isRecoverable,
} from '../error.js';
import { SilentOutput, type Output } from '../output.js';
import { resolveConfig, type SessionConfig } from '../config.js';
import {
  bytesToHex,
  concat,
  constantTimeEquals,
  stringToBytes,
  transcriptHash,
  writeLengthPrefixedBytes,
} from '../crypto/utils.js';
import { AuthenticatedChannel } from '../channel/authenticated.js';
import { Direction } from '../channel/aead.js';
import { SessionKeyManager, type Clock } from '../keys/manager.js';
import { SecretKey, withSecret } from '../keys/secret.js';
import { derive, deriveSessionId } from '../keys/derive.js';
import { QuantumChannelSimulator, streamToSymbols, symbolsToStream } from '../quantum/simulator.js';
import { assertSufficient, sift } from '../quantum/sifter.js';
import { chooseSampleIndices, discardSample, estimate, sampleBits } from '../quantum/qber.js';
import {
  ParityCorrector,
  ParityOracle,
  PERMUTATION_SEED_BYTES,
  type ReconcilingParty,
  RECONCILIATION_PASSES,
  confirmationTag,
  firstBlockSize,
  nextBlockSize,
} from '../quantum/reconcile.js';
import { defaultRandom, type RandomSource } from '../quantum/random.js';
import type { Bit, QberReport, SiftedKey } from '../quantum/types.js';
import {
  fingerprint,
  generateKemKeypair,
  kemDecapsulate,
  kemEncapsulate,
  type Authenticator,
  type TrustPolicy,
} from '../auth/authenticator.js';
import type { Transport } from '../transport/types.js';
import {
  MessageType,
  encodeMessage,
  type AuthHandshakeMessage,
  type ControlMessage,
  type QuantumTransmissionMessage,
} from '../wire.js';
import { MessageChannel, abortReasonFor, type Termination } from './message-channel.js';
import { Role, assertTransition, isTerminal, type SessionPhase, type SessionState } from './state.js';

/** Per-side handshake nonce; the two together are the classical entropy */
export const HANDSHAKE_NONCE_BYTES = 16;

const INITIATOR_AUTH_LABEL = 'qkd/v1/auth/initiator';
const RESPONDER_AUTH_LABEL = 'qkd/v1/auth/responder';

export interface SessionOptions {
  role: Role;
  transport: Transport;
  authenticator: Authenticator;
  trust: TrustPolicy;
  config?: Partial<SessionConfig>;
  output?: Output;
  random?: RandomSource;
  clock?: Clock;
}

export interface HandshakeSummary {
  /** Hex session identifier, safe to log */
  sessionId: string;
  generation: number;
  attempts: number;
  qber: QberReport;
  siftedBits: number;
  reconciliation: ReconciliationSummary;
  /** Quantum bits fed into derivation after sampling and reconciliation */
  keyBits: number;
  peerFingerprint: string;
}

export interface ReconciliationSummary {
  passes: number;
  disclosedParities: number;
  /** Bits flipped on this side; always 0 on the initiator */
  correctedBits: number;
  /** Bits dropped for disclosed parities and the confirmation tag */
  discardedBits: number;
}

interface ExchangeResult {
  keyBits: readonly Bit[];
  siftedBits: number;
  report: QberReport;
}

interface ReconcileResult {
  keyBits: Bit[];
  summary: ReconciliationSummary;
}

interface AuthResult {
  initiatorNonce: Uint8Array;
  responderNonce: Uint8Array;
  sharedSecret: SecretKey;
  peerIdentity: Uint8Array;
}

interface Deferred {
  resolve: () => void;
  reject: (error: Error) => void;
}

export class SessionOrchestrator {
  readonly role: Role;
  private readonly config: SessionConfig;
  private readonly output: Output;
  private readonly random: RandomSource;
  private readonly authenticator: Authenticator;
  private readonly trust: TrustPolicy;
  private readonly messages: MessageChannel;
  private readonly keyManager: SessionKeyManager;
  private readonly channel: AuthenticatedChannel;
  private readonly simulator: QuantumChannelSimulator;

  private phase: SessionPhase = { kind: 'init' };
  private peerAuthenticated = false;
  private peerIdentity: Uint8Array | null = null;
  private rotation: Promise<void> | null = null;
  private rotationRequested = false;
  /** Peer sent Close; frames already queued stay readable until drained */
  private peerClosed = false;
  private activationWaiters: Deferred[] = [];
  private closing: Promise<void> | null = null;
  private lastHandshake: HandshakeSummary | null = null;
  private settle: (phase: SessionPhase) => void = () => {};
  private readonly settled: Promise<SessionPhase>;

  constructor(options: SessionOptions) {
    this.role = options.role;
    this.config = resolveConfig(options.config);
    this.output = options.output ?? new SilentOutput();
    this.random = options.random ?? defaultRandom;
    this.authenticator = options.authenticator;
    this.trust = options.trust;
    this.simulator = new QuantumChannelSimulator(this.random);
    this.keyManager = new SessionKeyManager(
      {
        rotationIntervalMs: this.config.rotationIntervalMs,
        rotationByteLimit: this.config.rotationByteLimit,
      },
      options.clock,
    );
    this.channel = new AuthenticatedChannel(
      this.keyManager,
      options.role === Role.Initiator ? Direction.InitiatorToResponder : Direction.ResponderToInitiator,
    );
    this.messages = new MessageChannel(options.transport, this.config.maxMessageSize);
    this.settled = new Promise(resolve => {
      this.settle = resolve;
    });
    this.messages.setHandlers({
      control: message => this.onControl(message),
      terminated: reason => this.onTerminated(reason),
    });
  }

  get state(): SessionState {
    return {
      role: this.role,
      phase: this.phase,
      generation: this.keyManager.generation,
      peerAuthenticated: this.peerAuthenticated,
    };
  }

  get keys(): SessionKeyManager {
    return this.keyManager;
  }

  get handshakeSummary(): HandshakeSummary | null {
    return this.lastHandshake;
  }

  /**
   * Run the handshake until the first key generation is active
   */
  async handshake(): Promise<HandshakeSummary> {
    if (this.phase.kind !== 'init') {
      throw new InvalidParameterError('Handshake already started', [], { phase: this.phase.kind });
    }
    this.messages.start();

    try {
      return await this.establish(null);
    } catch (error) {
      await this.abort(error);
      throw this.failure(error);
    }
  }

  /**
   * Seal and send one application message
   */
  async send(plaintext: Uint8Array, associatedData?: Uint8Array): Promise<void> {
    await this.ready();

    if (this.keyManager.isRotationDue()) {
      if (this.role === Role.Initiator) {
        this.beginRotation(null);
        await this.ready();
      } else if (!this.rotationRequested) {
        await this.requestRotation();
      }
    }

    const frame = this.channel.sealNext(plaintext, associatedData);
    try {
      await this.messages.send({ type: MessageType.AeadFrame, frame });
    } catch (error) {
      await this.abort(error);
      throw this.failure(error);
    }
  }

  /**
   * Next application message, or null once the session has been closed
   */
  async receive(): Promise<Uint8Array | null> {
    if (this.phase.kind === 'init') {
      throw new InvalidParameterError('Session has not been established');
    }
    if (this.phase.kind === 'aborted') {
      throw this.phase.reason;
    }

    const frame = await this.messages.nextFrame();
    if (!frame) {
      await this.finishAfterPeerClose();
      return null;
    }
    // The peer may switch to the new generation before our side of the rotation finishes
    if (frame.generation > this.keyManager.generation && this.rotation) {
      await this.rotation;
    }

    try {
      const opened = this.channel.openFrame(frame);
      if (opened.lostFrames > 0n) {
        await this.output.warning(
          `${opened.lostFrames} frame(s) lost before sequence ${opened.sequence} (generation ${opened.generation})`,
        );
      }
      await this.eraseDrained();
      if (!this.messages.hasQueuedFrames()) {
        await this.finishAfterPeerClose();
      }
      return opened.plaintext;
    } catch (error) {
      if (error instanceof AuthenticationFailureError) {
        await this.abort(error);
      }
      throw error;
    }
  }

  /**
   * Replace the session key with a freshly established generation.
   * The responder asks the initiator to start the exchange.
   */
  async rotate(): Promise<number> {
    await this.ready();

    if (this.role === Role.Initiator) {
      this.beginRotation(null);
    } else if (!this.rotation) {
      await this.requestRotation();
      await this.nextActivation();
    }
    await this.ready();
    return this.keyManager.generation;
  }

  /**
   * Orderly shutdown: notify the peer, erase every generation, close the transport
   */
  async close(): Promise<void> {
    if (this.rotation) {
      await this.rotation;
    }
    if (isTerminal(this.phase)) {
      await this.settled;
      return;
    }

    if (!this.messages.isEnded && this.phase.kind !== 'init') {
      try {
        await this.messages.send({ type: MessageType.Close });
      } catch (error) {
        await this.output.debug(`Close notification not delivered: ${errorMessage(error)}`);
      }
    }
    this.closing = this.finish();
    await this.closing;
  }

  /**
   * Resolves once the session is closed or aborted
   */
  async closed(): Promise<SessionPhase> {
    await this.closing;
    return this.settled;
  }

  // ==========================================================================
  // Handshake
  // ==========================================================================

  private async establish(first: QuantumTransmissionMessage | null): Promise<HandshakeSummary> {
    const maxAttempts = this.config.maxHandshakeAttempts;

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.runAttempt(attempt, attempt === 1 ? first : null);
      } catch (error) {
        if (!isRecoverable(error) || attempt >= maxAttempts) {
          throw error;
        }
        await this.output.warning(`Handshake attempt ${attempt} failed (${errorMessage(error)}), retrying with fresh states`);
      }
    }
  }

  private async runAttempt(attempt: number, first: QuantumTransmissionMessage | null): Promise<HandshakeSummary> {
    this.transition({ kind: 'qkd-exchange', attempt });
    const transcript: Uint8Array[] = [];

    const exchange = this.role === Role.Initiator
      ? await this.exchangeAsInitiator(attempt, transcript)
      : await this.exchangeAsResponder(attempt, transcript, first);

    await this.output.debug(
      `QBER ${exchange.report.errorRate.toFixed(4)} over ${exchange.report.sampleSize} sampled bits, ${exchange.keyBits.length} key bits remain`,
    );

    this.transition({ kind: 'reconciling', attempt });
    const reconciled = this.role === Role.Initiator
      ? await this.reconcileAsInitiator(exchange, transcript)
      : await this.reconcileAsResponder(exchange, transcript);
    await this.output.debug(
      `Reconciled in ${reconciled.summary.passes} passes: ${reconciled.summary.disclosedParities} parities disclosed, ` +
        `${reconciled.summary.correctedBits} bits corrected, ${reconciled.keyBits.length} key bits remain`,
    );

    this.transition({ kind: 'authenticating' });
    const auth = this.role === Role.Initiator
      ? await this.authenticateAsInitiator(transcript)
      : await this.authenticateAsResponder(transcript);

    this.transition({ kind: 'key-derivation' });
    const classicalEntropy = concat(auth.initiatorNonce, auth.responderNonce);
    let material: SecretKey;
    try {
      material = await withSecret(auth.sharedSecret, async secret =>
        secret.use(authenticated => derive(reconciled.keyBits, classicalEntropy, authenticated, this.config.keyLengthBits)),
      );
    } finally {
      classicalEntropy.fill(0);
    }

    const sessionId = bytesToHex(deriveSessionId(material, auth.initiatorNonce, auth.responderNonce));
    const key = this.keyManager.activate(material);
    this.transition({ kind: 'active', generation: key.generation });
    this.rotationRequested = false;

    const summary: HandshakeSummary = {
      sessionId,
      generation: key.generation,
      attempts: attempt,
      qber: exchange.report,
      siftedBits: exchange.siftedBits,
      reconciliation: reconciled.summary,
      keyBits: reconciled.keyBits.length,
      peerFingerprint: fingerprint(auth.peerIdentity),
    };
    this.lastHandshake = summary;

    for (const waiter of this.activationWaiters.splice(0)) {
      waiter.resolve();
    }
    await this.eraseDrained();
    await this.output.success(
      `Session ${sessionId.slice(0, 16)} active (generation ${key.generation}, peer ${summary.peerFingerprint})`,
    );
    return summary;
  }

  private async exchangeAsInitiator(attempt: number, transcript: Uint8Array[]): Promise<ExchangeResult> {
    const stream = this.simulator.generate(this.config.streamLength, this.config.channelErrorRate);
    transcript.push(await this.messages.send({
      type: MessageType.QuantumTransmission,
      states: streamToSymbols(stream),
    }));

    this.transition({ kind: 'sifting', attempt });
    const peerBases = await this.messages.expect(MessageType.BasisDisclosure, this.config.handshakeTimeoutMs);
    transcript.push(encodeMessage(peerBases));
    transcript.push(await this.messages.send({ type: MessageType.BasisDisclosure, bases: [...stream.bases] }));

    const sifted = sift(stream.bases, peerBases.bases, stream.bits);
    assertSufficient(sifted, this.config.minSiftedBits);

    this.transition({ kind: 'qber-check', attempt });
    const indices = chooseSampleIndices(sifted.bits.length, this.config.sampleFraction, this.random);
    transcript.push(await this.messages.send({
      type: MessageType.SampleDisclosure,
      indices,
      bits: sampleBits(sifted, indices),
    }));

    const peerSample = await this.messages.expect(MessageType.SampleDisclosure, this.config.handshakeTimeoutMs);
    transcript.push(encodeMessage(peerSample));
    if (!sameIndices(peerSample.indices, indices)) {
      throw new InvalidParameterError('Peer disclosed a different sample', [], {
        expected: indices.length,
        received: peerSample.indices.length,
      });
    }

    const report = estimate(sifted, peerSample.bits, indices, this.config.qberThreshold);
    return this.acceptSample(sifted, indices, report);
  }

  private async exchangeAsResponder(
    attempt: number,
    transcript: Uint8Array[],
    first: QuantumTransmissionMessage | null,
  ): Promise<ExchangeResult> {
    const transmission = first ?? await this.messages.expect(MessageType.QuantumTransmission, this.config.handshakeTimeoutMs);
    transcript.push(encodeMessage(transmission));

    const received = symbolsToStream(transmission.states, this.config.channelErrorRate);
    const measured = this.simulator.transmit(received, this.config.channelErrorRate);

    this.transition({ kind: 'sifting', attempt });
    transcript.push(await this.messages.send({ type: MessageType.BasisDisclosure, bases: [...measured.bases] }));
    const peerBases = await this.messages.expect(MessageType.BasisDisclosure, this.config.handshakeTimeoutMs);
    transcript.push(encodeMessage(peerBases));

    const sifted = sift(measured.bases, peerBases.bases, measured.bits);
    assertSufficient(sifted, this.config.minSiftedBits);

    this.transition({ kind: 'qber-check', attempt });
    const peerSample = await this.messages.expect(MessageType.SampleDisclosure, this.config.handshakeTimeoutMs);
    transcript.push(encodeMessage(peerSample));

    const report = estimate(sifted, peerSample.bits, peerSample.indices, this.config.qberThreshold);
    // Answer before deciding so both sides reach the same verdict
    transcript.push(await this.messages.send({
      type: MessageType.SampleDisclosure,
      indices: peerSample.indices,
      bits: sampleBits(sifted, peerSample.indices),
    }));

    return this.acceptSample(sifted, peerSample.indices, report);
  }

  private acceptSample(sifted: SiftedKey, indices: readonly number[], report: QberReport): ExchangeResult {
    if (report.decision === 'abort') {
      throw new EavesdroppingSuspectedError(
        `QBER ${report.errorRate.toFixed(4)} exceeds threshold ${this.config.qberThreshold}`,
        {
          errorRate: report.errorRate,
          threshold: this.config.qberThreshold,
          sampleSize: report.sampleSize,
          mismatches: report.mismatches,
        },
      );
    }
    return {
      keyBits: discardSample(sifted, indices).bits,
      siftedBits: sifted.bits.length,
      report,
    };
  }

  private async reconcileAsInitiator(exchange: ExchangeResult, transcript: Uint8Array[]): Promise<ReconcileResult> {
    const oracle = new ParityOracle(exchange.keyBits);
    let blockSize = firstBlockSize(exchange.report.errorRate, exchange.keyBits.length);

    for (let pass = 0; pass < RECONCILIATION_PASSES; pass++) {
      const seed = this.random(PERMUTATION_SEED_BYTES);
      transcript.push(await this.messages.send({
        type: MessageType.ReconcileBlocks,
        seed,
        blockSize,
        parities: oracle.openPass(seed, blockSize),
      }));

      for (;;) {
        const request = await this.messages.expect(MessageType.ReconcileRequest, this.config.handshakeTimeoutMs);
        transcript.push(encodeMessage(request));
        if (request.ranges.length === 0) {
          break;
        }
        transcript.push(await this.messages.send({
          type: MessageType.ReconcileParities,
          parities: oracle.answer(request.ranges),
        }));
      }
      blockSize = nextBlockSize(blockSize, exchange.keyBits.length);
    }

    const tag = confirmationTag(oracle.reconciledBits, transcriptContext(transcript));
    transcript.push(await this.messages.send({ type: MessageType.ReconcileConfirm, tag }));
    const reply = await this.messages.expect(MessageType.ReconcileConfirm, this.config.handshakeTimeoutMs);
    transcript.push(encodeMessage(reply));

    return this.confirmReconciliation(oracle, 0, tag, reply.tag);
  }

  private async reconcileAsResponder(exchange: ExchangeResult, transcript: Uint8Array[]): Promise<ReconcileResult> {
    const corrector = new ParityCorrector(exchange.keyBits);

    for (let pass = 0; pass < RECONCILIATION_PASSES; pass++) {
      const blocks = await this.messages.expect(MessageType.ReconcileBlocks, this.config.handshakeTimeoutMs);
      transcript.push(encodeMessage(blocks));
      corrector.openPass(blocks.seed, blocks.blockSize, blocks.parities);

      for (;;) {
        const ranges = corrector.requests();
        transcript.push(await this.messages.send({ type: MessageType.ReconcileRequest, ranges }));
        if (ranges.length === 0) {
          break;
        }
        const answer = await this.messages.expect(MessageType.ReconcileParities, this.config.handshakeTimeoutMs);
        transcript.push(encodeMessage(answer));
        corrector.resolve(answer.parities);
      }
    }

    const peerConfirm = await this.messages.expect(MessageType.ReconcileConfirm, this.config.handshakeTimeoutMs);
    const tag = confirmationTag(corrector.reconciledBits, transcriptContext(transcript));
    transcript.push(encodeMessage(peerConfirm));
    // Reply before comparing so both sides reach the same verdict
    transcript.push(await this.messages.send({ type: MessageType.ReconcileConfirm, tag }));

    return this.confirmReconciliation(corrector, corrector.correctedBits, tag, peerConfirm.tag);
  }

  private confirmReconciliation(
    party: ReconcilingParty,
    correctedBits: number,
    ours: Uint8Array,
    theirs: Uint8Array,
  ): ReconcileResult {
    if (!constantTimeEquals(ours, theirs)) {
      throw new ReconciliationFailedError('Reconciled keys do not match', {
        passes: party.passes,
        disclosedParities: party.disclosedParities,
      });
    }

    const keyBits = party.finalBits();
    if (keyBits.length === 0) {
      throw new InsufficientKeyMaterialError('No key bits left after reconciliation', {
        reconciledBits: party.reconciledBits.length,
        disclosedParities: party.disclosedParities,
      });
    }
    return {
      keyBits,
      summary: {
        passes: party.passes,
        disclosedParities: party.disclosedParities,
        correctedBits,
        discardedBits: party.reconciledBits.length - keyBits.length,
      },
    };
  }

  private async authenticateAsInitiator(transcript: Uint8Array[]): Promise<AuthResult> {
    const nonce = this.random(HANDSHAKE_NONCE_BYTES);
    const kem = await generateKemKeypair();

    try {
      const identity = this.authenticator.identity;
      const signature = await this.authenticator.sign(
        authPayload(INITIATOR_AUTH_LABEL, transcript, identity, nonce, kem.publicKey),
      );
      transcript.push(await this.messages.send({
        type: MessageType.AuthHandshake,
        identity,
        nonce,
        kem: kem.publicKey,
        signature,
      }));

      const reply = await this.messages.expect(MessageType.AuthHandshake, this.config.handshakeTimeoutMs);
      await this.verifyPeer(reply, RESPONDER_AUTH_LABEL, transcript);

      let sharedSecret: Uint8Array;
      try {
        sharedSecret = await kemDecapsulate(reply.kem, kem.secretKey);
      } catch (error) {
        throw new AuthenticationFailureError(`KEM decapsulation failed: ${errorMessage(error)}`);
      }

      return {
        initiatorNonce: nonce,
        responderNonce: reply.nonce,
        sharedSecret: new SecretKey(sharedSecret),
        peerIdentity: reply.identity,
      };
    } finally {
      kem.secretKey.fill(0);
    }
  }

  private async authenticateAsResponder(transcript: Uint8Array[]): Promise<AuthResult> {
    const hello = await this.messages.expect(MessageType.AuthHandshake, this.config.handshakeTimeoutMs);
    await this.verifyPeer(hello, INITIATOR_AUTH_LABEL, transcript);
    transcript.push(encodeMessage(hello));

    let encapsulation: { ciphertext: Uint8Array; sharedSecret: Uint8Array };
    try {
      encapsulation = await kemEncapsulate(hello.kem);
    } catch (error) {
      throw new AuthenticationFailureError(`KEM encapsulation failed: ${errorMessage(error)}`);
    }
    const sharedSecret = new SecretKey(encapsulation.sharedSecret);

    try {
      const identity = this.authenticator.identity;
      const nonce = this.random(HANDSHAKE_NONCE_BYTES);
      const signature = await this.authenticator.sign(
        authPayload(RESPONDER_AUTH_LABEL, transcript, identity, nonce, encapsulation.ciphertext),
      );
      await this.messages.send({
        type: MessageType.AuthHandshake,
        identity,
        nonce,
        kem: encapsulation.ciphertext,
        signature,
      });

      return {
        initiatorNonce: hello.nonce,
        responderNonce: nonce,
        sharedSecret,
        peerIdentity: hello.identity,
      };
    } catch (error) {
      sharedSecret.erase();
      throw error;
    }
  }

  private async verifyPeer(message: AuthHandshakeMessage, label: string, transcript: Uint8Array[]): Promise<void> {
    const peer = fingerprint(message.identity);
    if (message.nonce.length < HANDSHAKE_NONCE_BYTES) {
      throw new AuthenticationFailureError('Peer handshake nonce too short', { length: message.nonce.length, peer });
    }

    const valid = await this.authenticator.verify(
      message.identity,
      authPayload(label, transcript, message.identity, message.nonce, message.kem),
      message.signature,
    );
    if (!valid) {
      throw new AuthenticationFailureError('Handshake signature verification failed', { peer });
    }
    if (this.peerIdentity && !constantTimeEquals(this.peerIdentity, message.identity)) {
      throw new AuthenticationFailureError('Peer identity changed during the session', { peer });
    }
    if (!this.trust.accepts(message.identity)) {
      throw new AuthenticationFailureError('Peer identity is not trusted', { peer });
    }

    this.peerIdentity = Uint8Array.from(message.identity);
    this.peerAuthenticated = true;
    await this.output.debug(`Peer ${peer} authenticated`);
  }

  // ==========================================================================
  // Rotation
  // ==========================================================================

  private beginRotation(first: QuantumTransmissionMessage | null): void {
    if (this.rotation || this.phase.kind !== 'active') {
      return;
    }
    this.transition({ kind: 'rotating', fromGeneration: this.phase.generation });
    this.rotation = this.runRotation(first).finally(() => {
      this.rotation = null;
    });
  }

  private async runRotation(first: QuantumTransmissionMessage | null): Promise<void> {
    const from = this.keyManager.generation;
    await this.output.info(`Rotating session key (generation ${from})`);
    try {
      await this.establish(first);
    } catch (error) {
      await this.abort(error);
    }
  }

  private async requestRotation(): Promise<void> {
    this.rotationRequested = true;
    await this.output.debug('Requesting key rotation');
    await this.messages.send({ type: MessageType.RotateRequest });
  }

  private nextActivation(): Promise<void> {
    return new Promise((resolve, reject) => this.activationWaiters.push({ resolve, reject }));
  }

  /**
   * Erase retired generations once no queued inbound frame still needs them
   */
  private async eraseDrained(): Promise<void> {
    for (const generation of this.keyManager.retiredGenerations()) {
      if (this.messages.hasQueuedFrames(generation)) {
        continue;
      }
      const erased = this.keyManager.erase(generation);
      this.channel.forget(generation);
      await this.output.debug(
        erased ? `Erased key generation ${generation}` : `Erasure of generation ${generation} deferred until leases drain`,
      );
    }
  }

  // ==========================================================================
  // Inbound control and teardown
  // ==========================================================================

  private onControl(message: ControlMessage): boolean {
    if (this.phase.kind !== 'active') {
      // A rotation request that crosses an exchange already under way
      return message.type === MessageType.RotateRequest && this.rotation !== null;
    }

    if (message.type === MessageType.QuantumTransmission && this.role === Role.Responder) {
      this.beginRotation(message);
      return true;
    }
    if (message.type === MessageType.RotateRequest && this.role === Role.Initiator) {
      this.beginRotation(null);
      return true;
    }
    return false;
  }

  private onTerminated(reason: Termination): void {
    if (isTerminal(this.phase)) {
      return;
    }
    if (reason) {
      this.closing = this.abort(reason, false);
    } else if (this.phase.kind === 'active') {
      this.peerClosed = true;
      if (!this.messages.hasQueuedFrames()) {
        this.closing = this.finish();
      }
    } else {
      this.closing = this.abort(new TransportError('Peer closed the connection during the handshake', {
        phase: this.phase.kind,
      }), false);
    }
  }

  /**
   * Wait out a rotation, then require an active session
   */
  private async ready(): Promise<void> {
    while (this.rotation) {
      await this.rotation;
    }
    if (this.phase.kind === 'aborted') {
      throw this.phase.reason;
    }
    if (this.phase.kind !== 'active') {
      throw new InvalidParameterError(`Session is not active (${this.phase.kind})`, [], { phase: this.phase.kind });
    }
    if (this.peerClosed) {
      throw new TransportError('Peer has closed the session');
    }
  }

  private async finishAfterPeerClose(): Promise<void> {
    if (this.peerClosed && !isTerminal(this.phase)) {
      this.closing = this.finish();
      await this.closing;
    }
  }

  private async abort(error: unknown, notifyPeer = true): Promise<void> {
    if (isTerminal(this.phase)) {
      return;
    }
    const reason = toSessionError(error);
    this.transition({ kind: 'aborted', reason });
    this.keyManager.eraseAll();
    this.rejectWaiters(reason);
    await this.output.error(`Session aborted: ${reason.message}`);

    if (notifyPeer && !this.messages.isEnded) {
      try {
        await this.messages.send({ type: MessageType.Abort, reason: abortReasonFor(reason), message: reason.message });
      } catch (sendError) {
        await this.output.debug(`Abort notification not delivered: ${errorMessage(sendError)}`);
      }
    }
    await this.closeTransport();
    this.settle(this.phase);
  }

  private async finish(): Promise<void> {
    this.transition({ kind: 'closed' });
    this.keyManager.eraseAll();
    this.rejectWaiters(new TransportError('Session closed'));
    await this.closeTransport();
    await this.output.info('Session closed');
    this.settle(this.phase);
  }

  private async closeTransport(): Promise<void> {
    try {
      await this.messages.close();
    } catch (error) {
      await this.output.debug(`Transport close failed: ${errorMessage(error)}`);
    }
  }

  private rejectWaiters(error: Error): void {
    for (const waiter of this.activationWaiters.splice(0)) {
      waiter.reject(error);
    }
  }

  private transition(next: SessionPhase): void {
    assertTransition(this.phase.kind, next.kind);
    this.phase = next;
  }

  /**
   * The error to surface to the caller: the recorded abort reason when there is one
   */
  private failure(error: unknown): SessionError {
    return this.phase.kind === 'aborted' ? this.phase.reason : toSessionError(error);
  }
}

function toSessionError(error: unknown): SessionError {
  if (error instanceof SessionError) {
    return error;
  }
  return new InvalidParameterError(`Unexpected session failure: ${errorMessage(error)}`);
}

function sameIndices(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((index, i) => index === b[i]);
}

/**
 * Signed handshake payload: SHA3-256 over the label, every prior handshake
 * message and this message's own fields, each length-prefixed
 */
function authPayload(
  label: string,
  transcript: readonly Uint8Array[],
  identity: Uint8Array,
  nonce: Uint8Array,
  kem: Uint8Array,
): Uint8Array {
  return transcriptHash(
    stringToBytes(label),
    ...transcript.map(writeLengthPrefixedBytes),
    writeLengthPrefixedBytes(identity),
    writeLengthPrefixedBytes(nonce),
    writeLengthPrefixedBytes(kem),
  );
}

function transcriptContext(transcript: readonly Uint8Array[]): Uint8Array {
  return transcriptHash(...transcript.map(writeLengthPrefixedBytes));
}
