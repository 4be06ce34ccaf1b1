/**
 * qkd-hybrid-channel
 *
 * Session keys from a simulated BB84 exchange, classical nonces and an
 * ML-KEM secret, with ChaCha20-Poly1305 frames, rotation and erasure.
 */

// Session
export { SessionOrchestrator, HANDSHAKE_NONCE_BYTES } from './session/orchestrator.js';
export type { SessionOptions, HandshakeSummary, ReconciliationSummary } from './session/orchestrator.js';
export { Role, canTransition, isTerminal } from './session/state.js';
export type { SessionPhase, SessionState, PhaseKind } from './session/state.js';
export { MessageChannel } from './session/message-channel.js';

// Quantum pipeline
export { QuantumChannelSimulator, streamToSymbols, symbolsToStream } from './quantum/simulator.js';
export { sift, assertSufficient } from './quantum/sifter.js';
export {
  DEFAULT_QBER_THRESHOLD,
  chooseSampleIndices,
  estimate,
  sampleBits,
  discardSample,
} from './quantum/qber.js';
export { Basis } from './quantum/types.js';
export type { Bit, BitBasisStream, SiftedKey, QberReport, QberDecision } from './quantum/types.js';
export {
  ParityCorrector,
  ParityOracle,
  RECONCILIATION_PASSES,
  CONFIRMATION_TAG_BYTES,
  confirmationTag,
  firstBlockSize,
  layoutPass,
} from './quantum/reconcile.js';
export type { PassLayout } from './quantum/reconcile.js';
export { defaultRandom, expandSeed } from './quantum/random.js';
export type { RandomSource } from './quantum/random.js';

// Keys
export { derive, deriveSessionId, MIN_CLASSICAL_ENTROPY_BYTES } from './keys/derive.js';
export { SessionKeyManager } from './keys/manager.js';
export type { HybridSessionKey, RotationPolicy, KeyLease, Clock } from './keys/manager.js';
export { SecretKey } from './keys/secret.js';

// Frames
export {
  seal,
  open,
  buildNonce,
  buildAssociatedData,
  oppositeDirection,
  Direction,
  NONCE_SIZE,
  TAG_SIZE,
} from './channel/aead.js';
export type { AeadFrame } from './channel/aead.js';
export { AuthenticatedChannel } from './channel/authenticated.js';
export type { OpenedFrame } from './channel/authenticated.js';

// Authentication
export {
  MlDsaAuthenticator,
  PinnedTrust,
  TrustOnFirstUse,
  fingerprint,
} from './auth/authenticator.js';
export type { Authenticator, TrustPolicy } from './auth/authenticator.js';

// Transport and wire
export { createLoopbackPair } from './transport/loopback.js';
export { SocketTransport, connectTcp, listenTcp } from './transport/tcp.js';
export type { TcpListener } from './transport/tcp.js';
export type { Transport, TransportOptions } from './transport/types.js';
export { MessageType, encodeMessage, decodeMessage, frameMessage, FrameDecoder } from './wire.js';
export type { WireMessage, ControlMessage, AbortReason } from './wire.js';

// Configuration
export { DEFAULT_CONFIG, resolveConfig, configFromEnv, validateConfig } from './config.js';
export type { SessionConfig } from './config.js';

// Errors
export {
  SessionError,
  InvalidParameterError,
  LengthMismatchError,
  InsufficientKeyMaterialError,
  InsufficientEntropyError,
  EavesdroppingSuspectedError,
  ReconciliationFailedError,
  AuthenticationFailureError,
  ReplayDetectedError,
  TagMismatchError,
  KeyUnavailableError,
  TransportError,
  HandshakeTimeoutError,
  isRecoverable,
} from './error.js';
export type { SessionErrorType, ErrorContext, ValidationIssue, ValidationResult } from './error.js';

// Output
export { ConsoleOutput, SilentOutput, MockOutput } from './output.js';
export type { Output, ConsoleOutputOptions } from './output.js';

export const VERSION = '0.1.0';
