import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, configFromEnv, resolveConfig, validateConfig } from '../../src/config.js';
import { InvalidParameterError } from '../../src/error.js';

describe('Session configuration', () => {
  it('uses the documented defaults', () => {
    const config = resolveConfig();
    expect(config.keyLengthBits).toBe(256);
    expect(config.qberThreshold).toBe(0.11);
    expect(config.sampleFraction).toBe(0.2);
    expect(config.rotationIntervalMs).toBe(600_000);
    expect(config.rotationByteLimit).toBe(64 * 1024 * 1024);
    expect(config.handshakeTimeoutMs).toBe(10_000);
    expect(config.maxMessageSize).toBe(16 * 1024 * 1024);
  });

  it('applies overrides on top of the defaults', () => {
    const config = resolveConfig({ qberThreshold: 0.05, streamLength: 2048 });
    expect(config.qberThreshold).toBe(0.05);
    expect(config.streamLength).toBe(2048);
    expect(config.sampleFraction).toBe(DEFAULT_CONFIG.sampleFraction);
  });

  it('rejects out-of-range overrides', () => {
    expect(() => resolveConfig({ qberThreshold: 1.2 })).toThrow(InvalidParameterError);
    expect(() => resolveConfig({ keyLengthBits: 128 })).toThrow(InvalidParameterError);
    expect(() => resolveConfig({ handshakeTimeoutMs: 0 })).toThrow(InvalidParameterError);
  });

  it('requires a non-zero sample fraction', () => {
    const result = validateConfig({ ...DEFAULT_CONFIG, sampleFraction: 0 });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([{ field: 'sampleFraction', message: 'Must be greater than 0', value: 0 }]);
  });

  it('reports every invalid field at once', () => {
    const result = validateConfig({ ...DEFAULT_CONFIG, channelErrorRate: -1, minSiftedBits: 0 });
    expect(result.errors.map(e => e.field)).toEqual(['channelErrorRate', 'minSiftedBits']);
  });

  describe('configFromEnv', () => {
    it('reads QKD_* variables as numbers', () => {
      const overrides = configFromEnv({
        QKD_QBER_THRESHOLD: '0.08',
        QKD_CHANNEL_ERROR_RATE: '0.02',
        QKD_HANDSHAKE_TIMEOUT_MS: '2500',
      });
      expect(overrides).toEqual({ qberThreshold: 0.08, channelErrorRate: 0.02, handshakeTimeoutMs: 2500 });
    });

    it('skips unset and blank variables', () => {
      expect(configFromEnv({ QKD_SAMPLE_FRACTION: '  ' })).toEqual({});
    });

    it('maps QKD_DEBUG or DEBUG to the debug flag', () => {
      expect(configFromEnv({ QKD_DEBUG: 'true' })).toEqual({ debug: true });
      expect(configFromEnv({ DEBUG: '1' })).toEqual({ debug: true });
      expect(configFromEnv({ QKD_DEBUG: 'no' })).toEqual({ debug: false });
    });

    it('leaves validation to resolveConfig', () => {
      const overrides = configFromEnv({ QKD_STREAM_LENGTH: 'lots' });
      expect(Number.isNaN(overrides.streamLength)).toBe(true);
      expect(() => resolveConfig(overrides)).toThrow(InvalidParameterError);
    });
  });
});
