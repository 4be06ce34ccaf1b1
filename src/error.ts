/**
 * Error taxonomy for the session pipeline
 * Every error carries a type tag plus structured context for logging
 */

export type SessionErrorType =
  | 'InvalidParameter'
  | 'LengthMismatch'
  | 'InsufficientKeyMaterial'
  | 'InsufficientEntropy'
  | 'EavesdroppingSuspected'
  | 'ReconciliationFailed'
  | 'AuthenticationFailure'
  | 'KeyUnavailable'
  | 'Transport';

export type ErrorContext = Record<string, unknown>;

export class SessionError extends Error {
  constructor(
    public type: SessionErrorType,
    public context: ErrorContext,
    message: string,
  ) {
    super(message);
    this.name = 'SessionError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface ValidationIssue {
  field: string;
  message: string;
  value?: unknown;
}

/**
 * Validation result with error accumulation
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
}

/**
 * Malformed configuration or call arguments. Fatal to the call, not the process.
 */
export class InvalidParameterError extends SessionError {
  issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = [], context: ErrorContext = {}) {
    super('InvalidParameter', context, message);
    this.name = 'InvalidParameterError';
    this.issues = issues;
  }
}

export class LengthMismatchError extends SessionError {
  constructor(message: string, context: ErrorContext = {}) {
    super('LengthMismatch', context, message);
    this.name = 'LengthMismatchError';
  }
}

export class InsufficientKeyMaterialError extends SessionError {
  constructor(message: string, context: ErrorContext = {}) {
    super('InsufficientKeyMaterial', context, message);
    this.name = 'InsufficientKeyMaterialError';
  }
}

export class InsufficientEntropyError extends SessionError {
  constructor(message: string, context: ErrorContext = {}) {
    super('InsufficientEntropy', context, message);
    this.name = 'InsufficientEntropyError';
  }
}

/**
 * QBER over threshold. Terminal for the session and never retried automatically.
 */
export class EavesdroppingSuspectedError extends SessionError {
  constructor(message: string, context: ErrorContext = {}) {
    super('EavesdroppingSuspected', context, message);
    this.name = 'EavesdroppingSuspectedError';
  }
}

/**
 * The two sides still hold different bits after error correction
 */
export class ReconciliationFailedError extends SessionError {
  constructor(message: string, context: ErrorContext = {}) {
    super('ReconciliationFailed', context, message);
    this.name = 'ReconciliationFailedError';
  }
}

export class AuthenticationFailureError extends SessionError {
  constructor(message: string, context: ErrorContext = {}) {
    super('AuthenticationFailure', context, message);
    this.name = 'AuthenticationFailureError';
  }
}

export class ReplayDetectedError extends AuthenticationFailureError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = 'ReplayDetectedError';
  }
}

export class TagMismatchError extends AuthenticationFailureError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = 'TagMismatchError';
  }
}

export class KeyUnavailableError extends SessionError {
  constructor(message: string, context: ErrorContext = {}) {
    super('KeyUnavailable', context, message);
    this.name = 'KeyUnavailableError';
  }
}

export class TransportError extends SessionError {
  constructor(message: string, context: ErrorContext = {}) {
    super('Transport', context, message);
    this.name = 'TransportError';
  }
}

export class HandshakeTimeoutError extends TransportError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = 'HandshakeTimeoutError';
  }
}

/**
 * Errors that allow a fresh handshake attempt with new random material
 */
export function isRecoverable(error: unknown): boolean {
  return (
    error instanceof LengthMismatchError ||
    error instanceof InsufficientKeyMaterialError ||
    error instanceof ReconciliationFailedError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'unknown';
}
