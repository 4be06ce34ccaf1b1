/**
 * Session configuration
 * Defaults, environment overrides and validation
 */

import { ValidationResult } from './error.js';
import {
  assertValid,
  combine,
  validateDuration,
  validateKeyLength,
  validatePositiveInteger,
  validateRate,
} from './validation.js';

export interface SessionConfig {
  /** Derived key size */
  keyLengthBits: number;
  /** Highest acceptable quantum bit error rate */
  qberThreshold: number;
  /** Share of the sifted key disclosed for QBER estimation */
  sampleFraction: number;
  rotationIntervalMs: number;
  rotationByteLimit: number;
  handshakeTimeoutMs: number;
  /** Raw bit/basis pairs prepared per handshake attempt */
  streamLength: number;
  /** Simulated noise (or eavesdropper disturbance) on the quantum channel */
  channelErrorRate: number;
  /** Sifted bits required before QBER sampling */
  minSiftedBits: number;
  maxHandshakeAttempts: number;
  maxMessageSize: number;
  debug: boolean;
}

export const DEFAULT_CONFIG: Readonly<SessionConfig> = Object.freeze({
  keyLengthBits: 256,
  qberThreshold: 0.11,
  sampleFraction: 0.2,
  rotationIntervalMs: 10 * 60 * 1000,
  rotationByteLimit: 64 * 1024 * 1024,
  handshakeTimeoutMs: 10_000,
  streamLength: 1024,
  channelErrorRate: 0,
  minSiftedBits: 64,
  maxHandshakeAttempts: 3,
  maxMessageSize: 16 * 1024 * 1024, // 16MB
  debug: false,
});

export function validateConfig(config: SessionConfig): ValidationResult {
  const fraction = validateRate('sampleFraction', config.sampleFraction);
  if (fraction.valid && config.sampleFraction === 0) {
    fraction.valid = false;
    fraction.errors.push({ field: 'sampleFraction', message: 'Must be greater than 0', value: 0 });
  }

  return combine(
    validateKeyLength(config.keyLengthBits),
    validateRate('qberThreshold', config.qberThreshold),
    fraction,
    validateDuration('rotationIntervalMs', config.rotationIntervalMs),
    validatePositiveInteger('rotationByteLimit', config.rotationByteLimit),
    validateDuration('handshakeTimeoutMs', config.handshakeTimeoutMs),
    validatePositiveInteger('streamLength', config.streamLength),
    validateRate('channelErrorRate', config.channelErrorRate),
    validatePositiveInteger('minSiftedBits', config.minSiftedBits),
    validatePositiveInteger('maxHandshakeAttempts', config.maxHandshakeAttempts),
    validatePositiveInteger('maxMessageSize', config.maxMessageSize),
  );
}

/**
 * Apply overrides on top of the defaults and validate the result
 */
export function resolveConfig(overrides: Partial<SessionConfig> = {}): SessionConfig {
  const config: SessionConfig = { ...DEFAULT_CONFIG, ...overrides };
  assertValid(validateConfig(config), 'Invalid session configuration');
  return config;
}

type NumericKey = Exclude<keyof SessionConfig, 'debug'>;

const ENV_KEYS: ReadonlyArray<[NumericKey, string]> = [
  ['keyLengthBits', 'QKD_KEY_LENGTH_BITS'],
  ['qberThreshold', 'QKD_QBER_THRESHOLD'],
  ['sampleFraction', 'QKD_SAMPLE_FRACTION'],
  ['rotationIntervalMs', 'QKD_ROTATION_INTERVAL_MS'],
  ['rotationByteLimit', 'QKD_ROTATION_BYTE_LIMIT'],
  ['handshakeTimeoutMs', 'QKD_HANDSHAKE_TIMEOUT_MS'],
  ['streamLength', 'QKD_STREAM_LENGTH'],
  ['channelErrorRate', 'QKD_CHANNEL_ERROR_RATE'],
  ['minSiftedBits', 'QKD_MIN_SIFTED_BITS'],
  ['maxHandshakeAttempts', 'QKD_MAX_HANDSHAKE_ATTEMPTS'],
  ['maxMessageSize', 'QKD_MAX_MESSAGE_SIZE'],
];

/**
 * Read overrides from QKD_* environment variables
 * Unset or empty variables are skipped; validation happens in resolveConfig
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<SessionConfig> {
  const overrides: Partial<SessionConfig> = {};

  for (const [key, variable] of ENV_KEYS) {
    const raw = env[variable];
    if (typeof raw === 'string' && raw.trim().length > 0) {
      overrides[key] = Number(raw);
    }
  }

  const debug = env.QKD_DEBUG ?? env.DEBUG;
  if (typeof debug === 'string' && debug.length > 0) {
    overrides.debug = debug === 'true' || debug === '1';
  }

  return overrides;
}
